// =============================================================================
// SEED DATA: catalog a fresh memory store starts with
// =============================================================================

import type { Image, Network, Package } from "@cloudapi-double/core";

export const SEED_IMAGES: readonly Image[] = [
	{
		id: "11223344-0a0a-ff99-11bb-0a1b2c3d4e5f",
		name: "ubuntu-certified-22.04",
		os: "linux",
		version: "20240101",
		type: "zvol",
		description: "Ubuntu 22.04 LTS (HVM) for KVM instances",
		requirements: {},
		homepage: "",
		published_at: "2024-01-01T00:00:00.000Z",
		public: true,
		state: "active",
		tags: { role: "os" },
		eula: "",
		acl: [],
		owner: "00000000-0000-0000-0000-000000000000",
	},
	{
		id: "11223344-0a0a-dd77-33cc-4d5e6f7a8b9c",
		name: "base-64-lts",
		os: "smartos",
		version: "23.4.0",
		type: "zone-dataset",
		description: "A 64-bit SmartOS image with just essential packages installed.",
		requirements: {},
		homepage: "",
		published_at: "2024-02-01T00:00:00.000Z",
		public: true,
		state: "active",
		tags: { role: "os" },
		eula: "",
		acl: [],
		owner: "00000000-0000-0000-0000-000000000000",
	},
];

export const SEED_PACKAGES: readonly Package[] = [
	{
		id: "a1b2c3d4-0001-4000-8000-000000000001",
		name: "g4-highcpu-512M",
		memory: 512,
		disk: 10240,
		swap: 2048,
		vcpus: 1,
		lwps: 4000,
		default: true,
		version: "1.0.0",
		group: "High CPU",
		description: "Compute Optimized 512M RAM - 1 vCPU - 10 GB Disk",
	},
	{
		id: "a1b2c3d4-0001-4000-8000-000000000002",
		name: "g4-highcpu-1G",
		memory: 1024,
		disk: 25600,
		swap: 4096,
		vcpus: 1,
		lwps: 4000,
		default: false,
		version: "1.0.0",
		group: "High CPU",
		description: "Compute Optimized 1G RAM - 1 vCPU - 25 GB Disk",
	},
	{
		id: "a1b2c3d4-0001-4000-8000-000000000003",
		name: "g4-general-4G",
		memory: 4096,
		disk: 131072,
		swap: 8192,
		vcpus: 1,
		lwps: 4000,
		default: false,
		version: "1.0.0",
		group: "General",
		description: "General Purpose 4G RAM - 1 vCPU - 128 GB Disk",
	},
];

export const SEED_NETWORKS: readonly Network[] = [
	{
		id: "c2d3e4f5-0002-4000-8000-000000000001",
		name: "external",
		public: true,
		description: "Public internet",
	},
	{
		id: "c2d3e4f5-0002-4000-8000-000000000002",
		name: "internal",
		public: false,
		description: "Private fabric",
	},
];

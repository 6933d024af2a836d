// =============================================================================
// MEMORY STORE: CloudApiStore backed by in-memory Maps
// =============================================================================
// Holds the state of one account. Every value handed out is a deep copy, so
// callers can never reach into the store's own records.

import { createHash, randomUUID } from "node:crypto";
import {
	CloudApiError,
	type CloudApiStore,
	type CreateMachineInput,
	type FirewallRule,
	type Image,
	type Key,
	type Machine,
	type Network,
	type Package,
	type QueryFilters,
} from "@cloudapi-double/core";
import { matchesFilters, matchesTagFilters, paginate } from "./filters.js";
import { SEED_IMAGES, SEED_NETWORKS, SEED_PACKAGES } from "./seed.js";

export interface MemoryStoreOptions {
	/** Start with the built-in images, packages and networks. Default: `true` */
	seed?: boolean;
	images?: Image[];
	packages?: Package[];
	networks?: Network[];
	/** Clock used for `created` / `updated` timestamps. */
	now?: () => Date;
}

const IMAGE_FILTERS = ["name", "os", "version", "type", "state", "owner", "public"] as const;
const PACKAGE_FILTERS = ["name", "memory", "disk", "swap", "vcpus", "version", "group"] as const;
const MACHINE_FILTERS = ["name", "type", "state", "image", "memory", "package"] as const;

const BASE64_BLOB = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * OpenSSH-style MD5 fingerprint of a public key line (`type blob [comment]`).
 * Returns an empty string when the line has no decodable blob.
 */
export function fingerprintKey(key: string): string {
	const blob = key.trim().split(/\s+/)[1];
	if (!blob || !BASE64_BLOB.test(blob)) return "";
	const digest = createHash("md5").update(Buffer.from(blob, "base64")).digest("hex");
	return digest.match(/../g)?.join(":") ?? "";
}

function copy<T>(value: T): T {
	return structuredClone(value);
}

function machineType(image: Image): string {
	return image.type === "zvol" ? "virtualmachine" : "smartmachine";
}

export function memoryStore(options: MemoryStoreOptions = {}): CloudApiStore {
	const seed = options.seed ?? true;
	const now = options.now ?? (() => new Date());

	const keys = new Map<string, Key>();
	const images = new Map<string, Image>();
	const packages = new Map<string, Package>();
	const machines = new Map<string, Machine>();
	const fwRules = new Map<string, FirewallRule>();
	const networks = new Map<string, Network>();

	for (const image of [...(seed ? SEED_IMAGES : []), ...(options.images ?? [])]) {
		images.set(image.id, copy(image));
	}
	for (const pkg of [...(seed ? SEED_PACKAGES : []), ...(options.packages ?? [])]) {
		packages.set(pkg.name, copy(pkg));
	}
	for (const network of [...(seed ? SEED_NETWORKS : []), ...(options.networks ?? [])]) {
		networks.set(network.id, copy(network));
	}

	let nextHost = 2;

	function findPackage(nameOrId: string): Package | undefined {
		const byName = packages.get(nameOrId);
		if (byName) return byName;
		for (const pkg of packages.values()) {
			if (pkg.id === nameOrId) return pkg;
		}
		return undefined;
	}

	function defaultPackage(): Package | undefined {
		for (const pkg of packages.values()) {
			if (pkg.default) return pkg;
		}
		return packages.values().next().value;
	}

	function requireMachine(id: string): Machine {
		const machine = machines.get(id);
		if (!machine) throw CloudApiError.notFound(`machine ${id} not found`);
		return machine;
	}

	function requireFwRule(id: string): FirewallRule {
		const rule = fwRules.get(id);
		if (!rule) throw CloudApiError.notFound(`firewall rule ${id} not found`);
		return rule;
	}

	function touch(machine: Machine): void {
		machine.updated = now().toISOString();
	}

	function setRuleEnabled(id: string, enabled: boolean): FirewallRule {
		const rule = requireFwRule(id);
		rule.enabled = enabled;
		return copy(rule);
	}

	return {
		// --- Keys ---

		listKeys: async () => [...keys.values()].map(copy),

		getKey: async (name) => {
			const key = keys.get(name);
			if (!key) throw CloudApiError.notFound(`key ${name} not found`);
			return copy(key);
		},

		createKey: async (name, key) => {
			if (keys.has(name)) throw CloudApiError.alreadyExists(`key ${name} already exists`);
			const record: Key = { name, fingerprint: fingerprintKey(key), key };
			keys.set(name, record);
			return copy(record);
		},

		deleteKey: async (name) => {
			if (!keys.delete(name)) throw CloudApiError.notFound(`key ${name} not found`);
		},

		// --- Images ---

		listImages: async (filters) =>
			[...images.values()].filter((i) => matchesFilters(i, filters, IMAGE_FILTERS)).map(copy),

		getImage: async (id) => {
			const image = images.get(id);
			if (!image) throw CloudApiError.notFound(`image ${id} not found`);
			return copy(image);
		},

		// --- Packages ---

		listPackages: async (filters) =>
			[...packages.values()].filter((p) => matchesFilters(p, filters, PACKAGE_FILTERS)).map(copy),

		getPackage: async (name) => {
			const pkg = findPackage(name);
			if (!pkg) throw CloudApiError.notFound(`package ${name} not found`);
			return copy(pkg);
		},

		// --- Machines ---

		listMachines: async (filters: QueryFilters | undefined) => {
			const matched = [...machines.values()].filter(
				(m) => matchesFilters(m, filters, MACHINE_FILTERS) && matchesTagFilters(m.tags, filters),
			);
			return paginate(matched, filters).map(copy);
		},

		countMachines: async () => machines.size,

		getMachine: async (id) => copy(requireMachine(id)),

		createMachine: async (input: CreateMachineInput) => {
			const pkg = input.package ? findPackage(input.package) : defaultPackage();
			if (!pkg) throw CloudApiError.notFound(`package ${input.package} not found`);
			const image = images.get(input.image);
			if (!image) throw CloudApiError.notFound(`image ${input.image} not found`);

			const id = randomUUID();
			const name = input.name || `machine-${id.slice(0, 8)}`;
			for (const existing of machines.values()) {
				if (existing.name === name) {
					throw CloudApiError.alreadyExists(`machine ${name} already exists`);
				}
			}

			const publicNetwork = [...networks.values()].find((n) => n.public);
			const ip = `10.88.0.${nextHost++}`;
			const timestamp = now().toISOString();
			const machine: Machine = {
				id,
				name,
				type: machineType(image),
				state: "running",
				image: image.id,
				memory: pkg.memory,
				disk: pkg.disk,
				ips: [ip],
				metadata: { ...input.metadata },
				tags: { ...input.tags },
				created: timestamp,
				updated: timestamp,
				package: pkg.name,
				primaryIp: ip,
				networks: input.networks ? [...input.networks] : publicNetwork ? [publicNetwork.id] : [],
				firewall_enabled: false,
			};
			machines.set(id, machine);
			return copy(machine);
		},

		deleteMachine: async (id) => {
			requireMachine(id);
			machines.delete(id);
		},

		stopMachine: async (id) => {
			const machine = requireMachine(id);
			if (machine.state !== "running") {
				throw CloudApiError.invalidState(`machine ${id} is ${machine.state}, not running`);
			}
			machine.state = "stopped";
			touch(machine);
		},

		startMachine: async (id) => {
			const machine = requireMachine(id);
			if (machine.state !== "stopped") {
				throw CloudApiError.invalidState(`machine ${id} is ${machine.state}, not stopped`);
			}
			machine.state = "running";
			touch(machine);
		},

		rebootMachine: async (id) => {
			const machine = requireMachine(id);
			machine.state = "running";
			touch(machine);
		},

		resizeMachine: async (id, packageName) => {
			const machine = requireMachine(id);
			const pkg = findPackage(packageName);
			if (!pkg) throw CloudApiError.notFound(`package ${packageName} not found`);
			machine.package = pkg.name;
			machine.memory = pkg.memory;
			machine.disk = pkg.disk;
			touch(machine);
		},

		renameMachine: async (id, name) => {
			const machine = requireMachine(id);
			if (!name) throw CloudApiError.invalidArgument("machine name must not be empty");
			machine.name = name;
			touch(machine);
		},

		enableFirewallMachine: async (id) => {
			const machine = requireMachine(id);
			machine.firewall_enabled = true;
			touch(machine);
		},

		disableFirewallMachine: async (id) => {
			const machine = requireMachine(id);
			machine.firewall_enabled = false;
			touch(machine);
		},

		listMachineFirewallRules: async (id) => {
			requireMachine(id);
			return [...fwRules.values()]
				.filter((r) => r.rule.includes(`vm ${id}`) || r.rule.includes("all vms"))
				.map(copy);
		},

		// --- Firewall rules ---

		listFirewallRules: async () => [...fwRules.values()].map(copy),

		getFirewallRule: async (id) => copy(requireFwRule(id)),

		createFirewallRule: async (rule, enabled) => {
			const record: FirewallRule = { id: randomUUID(), enabled, rule };
			fwRules.set(record.id, record);
			return copy(record);
		},

		updateFirewallRule: async (id, rule, enabled) => {
			const record = requireFwRule(id);
			record.rule = rule;
			record.enabled = enabled;
			return copy(record);
		},

		enableFirewallRule: async (id) => setRuleEnabled(id, true),

		disableFirewallRule: async (id) => setRuleEnabled(id, false),

		deleteFirewallRule: async (id) => {
			requireFwRule(id);
			fwRules.delete(id);
		},

		// --- Networks ---

		listNetworks: async () => [...networks.values()].map(copy),

		getNetwork: async (id) => {
			const network = networks.get(id);
			if (!network) throw CloudApiError.notFound(`network ${id} not found`);
			return copy(network);
		},
	};
}

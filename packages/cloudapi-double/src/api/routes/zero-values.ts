// Zero-value resources rendered when the store returns null for a single
// resource. The request layer never renders a bare `null`.

import type { FirewallRule, Image, Key, Machine, Network, Package } from "@cloudapi-double/core";

export const emptyKey = (): Key => ({ name: "", fingerprint: "", key: "" });

export const emptyImage = (): Image => ({
	id: "",
	name: "",
	os: "",
	version: "",
	type: "",
	description: "",
	requirements: {},
	homepage: "",
	published_at: "",
	public: false,
	state: "",
	tags: {},
	eula: "",
	acl: [],
	owner: "",
});

export const emptyPackage = (): Package => ({
	id: "",
	name: "",
	memory: 0,
	disk: 0,
	swap: 0,
	vcpus: 0,
	lwps: 0,
	default: false,
	version: "",
	group: "",
	description: "",
});

export const emptyMachine = (): Machine => ({
	id: "",
	name: "",
	type: "",
	state: "",
	image: "",
	memory: 0,
	disk: 0,
	ips: [],
	metadata: {},
	tags: {},
	created: "",
	updated: "",
	package: "",
	primaryIp: "",
	networks: [],
	firewall_enabled: false,
});

export const emptyFirewallRule = (): FirewallRule => ({ id: "", enabled: false, rule: "" });

export const emptyNetwork = (): Network => ({ id: "", name: "", public: false, description: "" });

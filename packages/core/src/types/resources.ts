// =============================================================================
// RESOURCE TYPES: wire shapes of the CloudAPI resource families
// =============================================================================
// Field names follow the provider's JSON contract, snake_case included.

export interface Key {
	name: string;
	fingerprint: string;
	key: string;
}

export interface Image {
	id: string;
	name: string;
	os: string;
	version: string;
	type: string;
	description: string;
	requirements: Record<string, unknown>;
	homepage: string;
	published_at: string;
	public: boolean;
	state: string;
	tags: Record<string, string>;
	eula: string;
	acl: string[];
	owner: string;
}

export interface Package {
	id: string;
	name: string;
	memory: number;
	disk: number;
	swap: number;
	vcpus: number;
	lwps: number;
	default: boolean;
	version: string;
	group: string;
	description: string;
}

export type MachineState =
	| "provisioning"
	| "running"
	| "stopping"
	| "stopped"
	| "offline"
	| "deleted"
	| "failed";

export interface Machine {
	id: string;
	name: string;
	type: string;
	/** Empty string only in the zero-value machine. */
	state: MachineState | "";
	image: string;
	memory: number;
	disk: number;
	ips: string[];
	metadata: Record<string, string>;
	tags: Record<string, string>;
	created: string;
	updated: string;
	package: string;
	primaryIp: string;
	networks: string[];
	firewall_enabled: boolean;
}

export interface FirewallRule {
	id: string;
	enabled: boolean;
	rule: string;
}

export interface Network {
	id: string;
	name: string;
	public: boolean;
	description: string;
}

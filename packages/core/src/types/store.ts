// =============================================================================
// STORE CONTRACT: the resource store behind the HTTP double
// =============================================================================
// List and get operations may resolve to null: the request layer renders a
// null collection as [] and a null resource as the family's zero value.

import type { FirewallRule, Image, Key, Machine, Network, Package } from "./resources.js";

/** Raw `key=value` query filters. `undefined` means no query string at all. */
export type QueryFilters = Readonly<Record<string, string>>;

export interface CreateMachineInput {
	name: string;
	package: string;
	image: string;
	/** `undefined` when the request did not name any networks. */
	networks: string[] | undefined;
	metadata: Record<string, string>;
	tags: Record<string, string>;
}

export interface CloudApiStore {
	// --- Keys ---
	listKeys(): Promise<Key[] | null>;
	getKey(name: string): Promise<Key | null>;
	createKey(name: string, key: string): Promise<Key | null>;
	deleteKey(name: string): Promise<void>;

	// --- Images ---
	listImages(filters: QueryFilters | undefined): Promise<Image[] | null>;
	getImage(id: string): Promise<Image | null>;

	// --- Packages ---
	listPackages(filters: QueryFilters | undefined): Promise<Package[] | null>;
	getPackage(name: string): Promise<Package | null>;

	// --- Machines ---
	listMachines(filters: QueryFilters | undefined): Promise<Machine[] | null>;
	countMachines(): Promise<number>;
	getMachine(id: string): Promise<Machine | null>;
	createMachine(input: CreateMachineInput): Promise<Machine | null>;
	deleteMachine(id: string): Promise<void>;
	stopMachine(id: string): Promise<void>;
	startMachine(id: string): Promise<void>;
	rebootMachine(id: string): Promise<void>;
	resizeMachine(id: string, packageName: string): Promise<void>;
	renameMachine(id: string, name: string): Promise<void>;
	enableFirewallMachine(id: string): Promise<void>;
	disableFirewallMachine(id: string): Promise<void>;
	listMachineFirewallRules(id: string): Promise<FirewallRule[] | null>;

	// --- Firewall rules ---
	listFirewallRules(): Promise<FirewallRule[] | null>;
	getFirewallRule(id: string): Promise<FirewallRule | null>;
	createFirewallRule(rule: string, enabled: boolean): Promise<FirewallRule | null>;
	updateFirewallRule(id: string, rule: string, enabled: boolean): Promise<FirewallRule | null>;
	enableFirewallRule(id: string): Promise<FirewallRule | null>;
	disableFirewallRule(id: string): Promise<FirewallRule | null>;
	deleteFirewallRule(id: string): Promise<void>;

	// --- Networks ---
	listNetworks(): Promise<Network[] | null>;
	getNetwork(id: string): Promise<Network | null>;
}

import type { CloudApiStore } from "@cloudapi-double/core";
import type { ApiRequest } from "../api/request-helpers.js";

export interface StoreCall {
	method: keyof CloudApiStore;
	args: unknown[];
}

/**
 * A store whose lists and gets resolve to null and whose commands do nothing.
 * Every call on the default methods is recorded; overrides are not.
 */
export function stubStore(overrides: Partial<CloudApiStore> = {}) {
	const calls: StoreCall[] = [];
	const record =
		<R>(method: keyof CloudApiStore, result: R) =>
		async (...args: unknown[]): Promise<R> => {
			calls.push({ method, args });
			return result;
		};

	const base: CloudApiStore = {
		listKeys: record("listKeys", null),
		getKey: record("getKey", null),
		createKey: record("createKey", null),
		deleteKey: record("deleteKey", undefined),
		listImages: record("listImages", null),
		getImage: record("getImage", null),
		listPackages: record("listPackages", null),
		getPackage: record("getPackage", null),
		listMachines: record("listMachines", null),
		countMachines: record("countMachines", 0),
		getMachine: record("getMachine", null),
		createMachine: record("createMachine", null),
		deleteMachine: record("deleteMachine", undefined),
		stopMachine: record("stopMachine", undefined),
		startMachine: record("startMachine", undefined),
		rebootMachine: record("rebootMachine", undefined),
		resizeMachine: record("resizeMachine", undefined),
		renameMachine: record("renameMachine", undefined),
		enableFirewallMachine: record("enableFirewallMachine", undefined),
		disableFirewallMachine: record("disableFirewallMachine", undefined),
		listMachineFirewallRules: record("listMachineFirewallRules", null),
		listFirewallRules: record("listFirewallRules", null),
		getFirewallRule: record("getFirewallRule", null),
		createFirewallRule: record("createFirewallRule", null),
		updateFirewallRule: record("updateFirewallRule", null),
		enableFirewallRule: record("enableFirewallRule", null),
		disableFirewallRule: record("disableFirewallRule", null),
		deleteFirewallRule: record("deleteFirewallRule", undefined),
		listNetworks: record("listNetworks", null),
		getNetwork: record("getNetwork", null),
	};

	return { store: { ...base, ...overrides }, calls };
}

export function req(method: string, target: string, body = ""): ApiRequest {
	const q = target.indexOf("?");
	return {
		method,
		path: q === -1 ? target : target.slice(0, q),
		query: q === -1 ? undefined : target.slice(q + 1),
		body,
	};
}

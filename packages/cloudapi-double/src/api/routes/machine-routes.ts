// =============================================================================
// MACHINE ROUTES: /{account}/machines
// =============================================================================

import type { CloudApiStore } from "@cloudapi-double/core";
import { parseFilters, queryParam } from "../request-helpers.js";
import { type ApiResponse, empty, json, NOT_ALLOWED } from "../response.js";
import { createMachineSchema, decodeBody } from "../validation.js";
import { defineResource, notAllowed, type ResourceRequest } from "./resource.js";
import { emptyMachine } from "./zero-values.js";

const FWRULES_SUFFIX = "/fwrules";

// =============================================================================
// LIFECYCLE ACTIONS
// =============================================================================

export type MachineActionName =
	| "stop"
	| "start"
	| "reboot"
	| "resize"
	| "rename"
	| "enable_firewall"
	| "disable_firewall";

interface MachineAction {
	name: MachineActionName;
	run: (store: CloudApiStore, id: string, query: string | undefined) => Promise<void>;
}

// Checked in this order; the first action whose name matches `?action=` wins.
export const MACHINE_ACTIONS: readonly MachineAction[] = [
	{ name: "stop", run: (store, id) => store.stopMachine(id) },
	{ name: "start", run: (store, id) => store.startMachine(id) },
	{ name: "reboot", run: (store, id) => store.rebootMachine(id) },
	{
		name: "resize",
		run: (store, id, query) => store.resizeMachine(id, queryParam(query, "package")),
	},
	{
		name: "rename",
		run: (store, id, query) => store.renameMachine(id, queryParam(query, "name")),
	},
	{ name: "enable_firewall", run: (store, id) => store.enableFirewallMachine(id) },
	{ name: "disable_firewall", run: (store, id) => store.disableFirewallMachine(id) },
];

/**
 * Interpret `?action=` on a POST to a single machine. Unknown or missing
 * actions are rejected with 405; store failures propagate.
 */
export async function dispatchMachineAction(
	req: ResourceRequest,
	store: CloudApiStore,
): Promise<ApiResponse> {
	const requested = queryParam(req.query, "action");
	const action = MACHINE_ACTIONS.find((a) => a.name === requested);
	if (!action) return NOT_ALLOWED;
	await action.run(store, req.id, req.query);
	return empty(202);
}

// =============================================================================
// ROUTES
// =============================================================================

export const machineRoutes = defineResource("machines", {
	GET: async (req, store) => {
		if (req.isCollection) {
			const machines = await store.listMachines(parseFilters(req.query));
			return json(200, machines ?? []);
		}
		if (req.id.endsWith(FWRULES_SUFFIX)) {
			const rules = await store.listMachineFirewallRules(req.id.slice(0, -FWRULES_SUFFIX.length));
			return json(200, rules ?? []);
		}
		const machine = await store.getMachine(req.id);
		return json(200, machine ?? emptyMachine());
	},

	HEAD: async (req, store) => {
		if (!req.isCollection) return NOT_ALLOWED;
		return json(200, await store.countMachines());
	},

	POST: async (req, store) => {
		if (!req.isCollection) return dispatchMachineAction(req, store);
		const input = decodeBody(createMachineSchema, req.body);
		const machine = await store.createMachine(input);
		return json(201, machine ?? emptyMachine());
	},

	PUT: notAllowed,

	DELETE: async (req, store) => {
		if (req.isCollection) return NOT_ALLOWED;
		await store.deleteMachine(req.id);
		return empty(204);
	},
});

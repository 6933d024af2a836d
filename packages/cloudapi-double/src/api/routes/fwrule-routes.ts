// =============================================================================
// FIREWALL RULE ROUTES: /{account}/fwrules
// =============================================================================
// POST is overloaded: the collection creates, `{id}/enable` and
// `{id}/disable` toggle, and any other `{id}` updates.

import { empty, json, NOT_ALLOWED } from "../response.js";
import { decodeBody, firewallRuleSchema } from "../validation.js";
import { defineResource, notAllowed } from "./resource.js";
import { emptyFirewallRule } from "./zero-values.js";

const ENABLE_SUFFIX = "/enable";
const DISABLE_SUFFIX = "/disable";

export const fwRuleRoutes = defineResource("fwrules", {
	GET: async (req, store) => {
		if (req.isCollection) {
			const rules = await store.listFirewallRules();
			return json(200, rules ?? []);
		}
		const rule = await store.getFirewallRule(req.id);
		return json(200, rule ?? emptyFirewallRule());
	},

	POST: async (req, store) => {
		if (req.isCollection) {
			const opts = decodeBody(firewallRuleSchema, req.body);
			const rule = await store.createFirewallRule(opts.rule, opts.enabled);
			return json(201, rule ?? emptyFirewallRule());
		}

		if (req.id.endsWith(ENABLE_SUFFIX)) {
			const rule = await store.enableFirewallRule(req.id.slice(0, -ENABLE_SUFFIX.length));
			return json(200, rule ?? emptyFirewallRule());
		}
		if (req.id.endsWith(DISABLE_SUFFIX)) {
			const rule = await store.disableFirewallRule(req.id.slice(0, -DISABLE_SUFFIX.length));
			return json(200, rule ?? emptyFirewallRule());
		}

		const opts = decodeBody(firewallRuleSchema, req.body);
		const rule = await store.updateFirewallRule(req.id, opts.rule, opts.enabled);
		return json(200, rule ?? emptyFirewallRule());
	},

	PUT: notAllowed,

	DELETE: async (req, store) => {
		if (req.isCollection) return NOT_ALLOWED;
		await store.deleteFirewallRule(req.id);
		return empty(204);
	},
});

// =============================================================================
// KEY ROUTES: /{account}/keys
// =============================================================================

import { empty, json, NOT_ALLOWED } from "../response.js";
import { createKeySchema, decodeBody } from "../validation.js";
import { defineResource, notAllowed } from "./resource.js";
import { emptyKey } from "./zero-values.js";

export const keyRoutes = defineResource("keys", {
	GET: async (req, store) => {
		if (req.isCollection) {
			const keys = await store.listKeys();
			return json(200, keys ?? []);
		}
		const key = await store.getKey(req.id);
		return json(200, key ?? emptyKey());
	},

	POST: async (req, store) => {
		if (!req.isCollection) return NOT_ALLOWED;
		const opts = decodeBody(createKeySchema, req.body);
		const key = await store.createKey(opts.name, opts.key);
		return json(201, key ?? emptyKey());
	},

	PUT: notAllowed,

	DELETE: async (req, store) => {
		if (req.isCollection) return NOT_ALLOWED;
		await store.deleteKey(req.id);
		return empty(204);
	},
});

// =============================================================================
// NETWORK ROUTES: /{account}/networks (read-only)
// =============================================================================

import { json } from "../response.js";
import { defineResource, notAllowed } from "./resource.js";
import { emptyNetwork } from "./zero-values.js";

export const networkRoutes = defineResource("networks", {
	GET: async (req, store) => {
		if (req.isCollection) {
			const networks = await store.listNetworks();
			return json(200, networks ?? []);
		}
		const network = await store.getNetwork(req.id);
		return json(200, network ?? emptyNetwork());
	},
	POST: notAllowed,
	PUT: notAllowed,
	DELETE: notAllowed,
});

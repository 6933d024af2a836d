// =============================================================================
// PACKAGE ROUTES: /{account}/packages (read-only)
// =============================================================================

import { parseFilters } from "../request-helpers.js";
import { json } from "../response.js";
import { defineResource, notAllowed } from "./resource.js";
import { emptyPackage } from "./zero-values.js";

export const packageRoutes = defineResource("packages", {
	GET: async (req, store) => {
		if (req.isCollection) {
			const pkgs = await store.listPackages(parseFilters(req.query));
			return json(200, pkgs ?? []);
		}
		const pkg = await store.getPackage(req.id);
		return json(200, pkg ?? emptyPackage());
	},
	POST: notAllowed,
	PUT: notAllowed,
	DELETE: notAllowed,
});

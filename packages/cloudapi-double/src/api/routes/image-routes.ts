// =============================================================================
// IMAGE ROUTES: /{account}/images (read-only)
// =============================================================================

import { parseFilters } from "../request-helpers.js";
import { json, NOT_ALLOWED, NOT_FOUND } from "../response.js";
import { defineResource, notAllowed } from "./resource.js";
import { emptyImage } from "./zero-values.js";

export const imageRoutes = defineResource("images", {
	GET: async (req, store) => {
		if (req.isCollection) {
			const images = await store.listImages(parseFilters(req.query));
			return json(200, images ?? []);
		}
		const image = await store.getImage(req.id);
		return json(200, image ?? emptyImage());
	},

	// Creating an image from a machine is not supported.
	POST: async (req) => (req.isCollection ? NOT_FOUND : NOT_ALLOWED),

	PUT: notAllowed,
	DELETE: notAllowed,
});

// =============================================================================
// ROUTE INDEX: every resource family the double serves
// =============================================================================

import { fwRuleRoutes } from "./fwrule-routes.js";
import { imageRoutes } from "./image-routes.js";
import { keyRoutes } from "./key-routes.js";
import { machineRoutes } from "./machine-routes.js";
import { networkRoutes } from "./network-routes.js";
import { packageRoutes } from "./package-routes.js";
import type { ResourceFamily } from "./resource.js";

export const resourceFamilies: readonly ResourceFamily[] = [
	keyRoutes,
	imageRoutes,
	packageRoutes,
	machineRoutes,
	fwRuleRoutes,
	networkRoutes,
];

export { dispatchMachineAction, MACHINE_ACTIONS, type MachineActionName } from "./machine-routes.js";
export {
	defineResource,
	dispatchResource,
	HTTP_METHODS,
	type HttpMethod,
	type MethodHandler,
	notAllowed,
	type ResourceFamily,
	type ResourceRequest,
} from "./resource.js";

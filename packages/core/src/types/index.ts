export type { CloudApiDoubleOptions, CloudApiLogger } from "./config.js";
export type {
	FirewallRule,
	Image,
	Key,
	Machine,
	MachineState,
	Network,
	Package,
} from "./resources.js";
export type { CloudApiStore, CreateMachineInput, QueryFilters } from "./store.js";

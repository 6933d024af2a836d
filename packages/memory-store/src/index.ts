export { fingerprintKey, type MemoryStoreOptions, memoryStore } from "./store.js";
export { SEED_IMAGES, SEED_NETWORKS, SEED_PACKAGES } from "./seed.js";

export * from "./api/index.js";
export { validateConfig } from "./config/index.js";
export { type CloudApiDouble, createCloudApiDouble } from "./double/index.js";

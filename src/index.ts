export * from "./caddy/index.js";
export type { Config } from "./config/index.js";
export { config, parseConfig } from "./config/index.js";
export { logger } from "./config/logger.js";
export * from "./proxy-route/index.js";

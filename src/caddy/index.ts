export type { CaddyAdminClientOptions, FetchFn } from "./client.js";
export { CaddyAdminClient } from "./client.js";
export { BackendError, CaddyClientError, EncodingError, NotFoundError, TransportError } from "./errors.js";
export { DEFAULT_ROUTE_ID, routeId } from "./route-id.js";
export type {
  CaddyHandler,
  CaddyHeaderOps,
  CaddyHeaders,
  CaddyHealthChecks,
  CaddyLoadBalancing,
  CaddyMatchSet,
  CaddyRoute,
  CaddyTransport,
  CaddyUpstream,
  UpstreamHealth,
} from "./types.js";

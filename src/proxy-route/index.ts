export {
  available,
  creating,
  deleting,
  getCondition,
  reconcileError,
  reconcileSuccess,
  setConditions,
} from "./conditions.js";
export { serverNameOf, toCaddyRoute, toUpstreamStatuses } from "./convert.js";
export type {
  ExternalClient,
  ExternalConnector,
  ExternalObservation,
  ProxyRouteConnectorOptions,
} from "./external.js";
export {
  errCreateRoute,
  errDeleteRoute,
  errGetRoute,
  errUpdateRoute,
  ProxyRouteConnector,
  ProxyRouteExternal,
} from "./external.js";
export { EXTERNAL_NAME_ANNOTATION, getExternalName, setExternalName } from "./meta.js";
export type { ReconcileAction } from "./reconciler.js";
export { ProxyRouteReconciler } from "./reconciler.js";
export type {
  Condition,
  ConditionType,
  DeletionPolicy,
  Managed,
  ProxyRoute,
  ProxyRouteObservation,
  ProxyRouteParameters,
  RouteMatch,
  Upstream,
  UpstreamStatus,
} from "./types.js";
export { asProxyRoute, PROXY_ROUTE_KIND, parseProxyRoute, proxyRouteSchema, TypeMismatchError } from "./types.js";

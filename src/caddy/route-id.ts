import type { CaddyRoute } from "./types.js";

/** Identifier of a route with no usable match conditions. */
export const DEFAULT_ROUTE_ID = "default";

/**
 * Derive a stable identifier for a route from its match conditions.
 *
 * Caddy assigns no durable ID to entries of a `routes` array, so routes are
 * located by recomputing this value. Only the first matcher set is consulted,
 * and only its host, path and method fields, in that order. Routes that agree
 * on those fields collide.
 */
export function routeId(route: CaddyRoute): string {
  const matchSet = route.match?.[0];
  if (!matchSet) return DEFAULT_ROUTE_ID;

  const parts: string[] = [];
  if (matchSet.host && matchSet.host.length > 0) {
    parts.push(`host:${matchSet.host.join(",")}`);
  }
  if (matchSet.path && matchSet.path.length > 0) {
    parts.push(`path:${matchSet.path.join(",")}`);
  }
  if (matchSet.method && matchSet.method.length > 0) {
    parts.push(`method:${matchSet.method.join(",")}`);
  }

  return parts.length > 0 ? parts.join("|") : DEFAULT_ROUTE_ID;
}

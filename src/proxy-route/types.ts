import { z } from "zod";

export const PROXY_ROUTE_KIND = "ProxyRoute";

const stringList = z.array(z.string());
const headerMap = z.record(z.string(), stringList);

/** Request conditions a route is restricted to. */
export const routeMatchSchema = z.object({
  /** Request host names. */
  host: stringList.optional(),
  /** Request paths; wildcards such as "/api/*" are allowed. */
  path: stringList.optional(),
  method: stringList.optional(),
  headers: headerMap.optional(),
});
export type RouteMatch = z.infer<typeof routeMatchSchema>;

export const upstreamSchema = z.object({
  /** "host:port", or "host" for the scheme's default port. */
  dial: z.string().min(1),
  /** Maximum concurrent requests to this upstream. */
  maxRequests: z.number().int().optional(),
});
export type Upstream = z.infer<typeof upstreamSchema>;

export const loadBalancingPolicySchema = z.enum(["random", "round_robin", "least_conn", "ip_hash", "header", "cookie"]);
export type LoadBalancingPolicy = z.infer<typeof loadBalancingPolicySchema>;

export const loadBalancingSchema = z.object({
  policy: loadBalancingPolicySchema.optional(),
  /** How long to keep trying to select an available upstream. */
  tryDuration: z.string().optional(),
  /** Wait between selection attempts. */
  tryInterval: z.string().optional(),
});
export type LoadBalancing = z.infer<typeof loadBalancingSchema>;

export const headerManipulationSchema = z.object({
  /** Replace header values. */
  set: headerMap.optional(),
  /** Append header values. */
  add: headerMap.optional(),
  /** Remove headers by name. */
  delete: stringList.optional(),
});
export type HeaderManipulation = z.infer<typeof headerManipulationSchema>;

export const headerOpsSchema = z.object({
  request: headerManipulationSchema.optional(),
  response: headerManipulationSchema.optional(),
});
export type HeaderOps = z.infer<typeof headerOpsSchema>;

export const healthChecksSchema = z.object({
  active: z
    .object({
      path: z.string().optional(),
      interval: z.string().optional(),
      timeout: z.string().optional(),
    })
    .optional(),
  passive: z
    .object({
      maxFails: z.number().int().optional(),
      unhealthyLatency: z.string().optional(),
    })
    .optional(),
});
export type HealthChecks = z.infer<typeof healthChecksSchema>;

export const upstreamTlsSchema = z.object({
  enabled: z.boolean().optional(),
  /** Server name used to verify the upstream certificate. */
  serverName: z.string().optional(),
  insecureSkipVerify: z.boolean().optional(),
});
export type UpstreamTls = z.infer<typeof upstreamTlsSchema>;

/** Desired state of one Caddy reverse proxy route. */
export const proxyRouteParametersSchema = z.object({
  /** Caddy admin API endpoint, e.g. "http://localhost:2019". */
  caddyEndpoint: z.string().url(),
  /** Caddy server the route belongs to (default: config.caddy.defaultServerName). */
  serverName: z.string().min(1).optional(),
  match: routeMatchSchema.optional(),
  upstreams: z.array(upstreamSchema).min(1),
  loadBalancing: loadBalancingSchema.optional(),
  headers: headerOpsSchema.optional(),
  healthChecks: healthChecksSchema.optional(),
  tls: upstreamTlsSchema.optional(),
});
export type ProxyRouteParameters = z.infer<typeof proxyRouteParametersSchema>;

export const upstreamStatusSchema = z.object({
  address: z.string(),
  healthy: z.boolean(),
  numRequests: z.number().int(),
});
export type UpstreamStatus = z.infer<typeof upstreamStatusSchema>;

/** Observed state, written only by the reconciliation controller. */
export const proxyRouteObservationSchema = z.object({
  routeId: z.string().optional(),
  upstreamStatuses: z.array(upstreamStatusSchema).optional(),
});
export type ProxyRouteObservation = z.infer<typeof proxyRouteObservationSchema>;

export const conditionTypeSchema = z.enum(["Ready", "Synced"]);
export type ConditionType = z.infer<typeof conditionTypeSchema>;

export const conditionSchema = z.object({
  type: conditionTypeSchema,
  status: z.enum(["True", "False", "Unknown"]),
  reason: z.string(),
  message: z.string().optional(),
  lastTransitionTime: z.string(),
});
export type Condition = z.infer<typeof conditionSchema>;

/** What happens to the Caddy route when the resource is deleted. */
export const deletionPolicySchema = z.enum(["Delete", "Orphan"]);
export type DeletionPolicy = z.infer<typeof deletionPolicySchema>;

export const proxyRouteSchema = z.object({
  kind: z.literal(PROXY_ROUTE_KIND),
  metadata: z.object({
    name: z.string().min(1),
    annotations: z.record(z.string(), z.string()).default(() => ({})),
    /** Set by the owner once the resource is being deleted. */
    deletionTimestamp: z.string().optional(),
  }),
  spec: z.object({
    forProvider: proxyRouteParametersSchema,
    deletionPolicy: deletionPolicySchema.default("Delete"),
  }),
  status: z
    .object({
      conditions: z.array(conditionSchema).default(() => []),
      atProvider: proxyRouteObservationSchema.default(() => ({})),
    })
    .default(() => ({})),
});
export type ProxyRoute = z.infer<typeof proxyRouteSchema>;

/** Minimal shape shared by every managed resource handed to a reconciler. */
export interface Managed {
  kind: string;
  metadata: { name: string };
}

/** Validate a ProxyRoute manifest, applying defaults. */
export function parseProxyRoute(manifest: unknown): ProxyRoute {
  return proxyRouteSchema.parse(manifest);
}

/**
 * Narrow a managed resource to a ProxyRoute. The resource is validated and
 * its defaults are written back onto the same object, so later status
 * updates land where the caller can see them.
 */
export function asProxyRoute(mg: Managed): ProxyRoute {
  if (mg.kind !== PROXY_ROUTE_KIND) {
    throw new TypeMismatchError(mg.kind);
  }
  const parsed = proxyRouteSchema.safeParse(mg);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new TypeMismatchError(mg.kind, issues);
  }
  return Object.assign(mg, parsed.data);
}

/** Thrown when a reconciler is handed a resource of the wrong kind, or a malformed one. */
export class TypeMismatchError extends Error {
  readonly name = "TypeMismatchError" as const;
  constructor(kind: string, issues?: string) {
    super(
      issues === undefined
        ? `managed resource is not a ${PROXY_ROUTE_KIND} (got ${kind})`
        : `managed resource is not a valid ${PROXY_ROUTE_KIND}: ${issues}`,
    );
  }
}

import { z } from "zod";

/**
 * Wire model of the parts of Caddy's JSON config this project reads and writes.
 * Field names follow Caddy's snake_case. Unknown fields are stripped on decode.
 */

const stringList = z.array(z.string());
const headerMap = z.record(z.string(), stringList);
/** Caddy takes a duration string ("5s") or integer nanoseconds. */
const duration = z.union([z.string(), z.number().int()]);

/** One OR-branch of request matchers. */
export const caddyMatchSetSchema = z.object({
  host: stringList.optional(),
  path: stringList.optional(),
  method: stringList.optional(),
  header: headerMap.optional(),
});
export type CaddyMatchSet = z.infer<typeof caddyMatchSetSchema>;

export const caddyUpstreamSchema = z.object({
  /** Routes written by others may leave this to a dynamic upstream source. */
  dial: z.string().default(""),
  max_requests: z.number().int().optional(),
});
export type CaddyUpstream = z.infer<typeof caddyUpstreamSchema>;

export const caddyLoadBalancingSchema = z.object({
  selection_policy: z.object({ policy: z.string().optional() }).optional(),
  try_duration: duration.optional(),
  try_interval: duration.optional(),
});
export type CaddyLoadBalancing = z.infer<typeof caddyLoadBalancingSchema>;

export const caddyHeaderOpsSchema = z.object({
  set: headerMap.optional(),
  add: headerMap.optional(),
  delete: stringList.optional(),
});
export type CaddyHeaderOps = z.infer<typeof caddyHeaderOpsSchema>;

export const caddyHeadersSchema = z.object({
  request: caddyHeaderOpsSchema.optional(),
  response: caddyHeaderOpsSchema.optional(),
});
export type CaddyHeaders = z.infer<typeof caddyHeadersSchema>;

export const caddyHealthChecksSchema = z.object({
  active: z
    .object({
      path: z.string().optional(),
      interval: duration.optional(),
      timeout: duration.optional(),
    })
    .optional(),
  passive: z
    .object({
      max_fails: z.number().int().optional(),
      unhealthy_latency: duration.optional(),
    })
    .optional(),
});
export type CaddyHealthChecks = z.infer<typeof caddyHealthChecksSchema>;

/** Upstream transport; only emitted when TLS to the upstream is enabled. */
export const caddyTransportSchema = z.object({
  protocol: z.string(),
  tls: z
    .object({
      server_name: z.string().optional(),
      insecure_skip_verify: z.boolean().optional(),
    })
    .optional(),
});
export type CaddyTransport = z.infer<typeof caddyTransportSchema>;

/**
 * A route handler. Only `reverse_proxy` is produced here, but routes written
 * by others may carry any handler name.
 */
export const caddyHandlerSchema = z.object({
  handler: z.string().default(""),
  upstreams: z.array(caddyUpstreamSchema).optional(),
  load_balancing: caddyLoadBalancingSchema.optional(),
  headers: caddyHeadersSchema.optional(),
  health_checks: caddyHealthChecksSchema.optional(),
  transport: caddyTransportSchema.optional(),
});
export type CaddyHandler = z.infer<typeof caddyHandlerSchema>;

/** A single entry of a server's `routes` array. */
export const caddyRouteSchema = z.object({
  match: z.array(caddyMatchSetSchema).optional(),
  handle: z.array(caddyHandlerSchema).default(() => []),
  terminal: z.boolean().optional(),
});
export type CaddyRoute = z.infer<typeof caddyRouteSchema>;

/** Caddy answers `null` for a server whose routes array was never set. */
export const caddyRouteListSchema = z
  .array(caddyRouteSchema)
  .nullable()
  .transform((routes) => routes ?? []);

/** Entry of GET /reverse_proxy/upstreams. */
export const upstreamHealthSchema = z.object({
  address: z.string(),
  healthy: z.boolean().default(false),
  num_requests: z.number().int().default(0),
});
export type UpstreamHealth = z.infer<typeof upstreamHealthSchema>;

export const upstreamHealthListSchema = z
  .array(upstreamHealthSchema)
  .nullable()
  .transform((upstreams) => upstreams ?? []);

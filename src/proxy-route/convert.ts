import type {
  CaddyHandler,
  CaddyHeaderOps,
  CaddyHealthChecks,
  CaddyLoadBalancing,
  CaddyMatchSet,
  CaddyRoute,
  CaddyTransport,
  CaddyUpstream,
  UpstreamHealth,
} from "../caddy/types.js";
import { config } from "../config/index.js";
import type { HeaderManipulation, HealthChecks, LoadBalancing, ProxyRouteParameters, UpstreamStatus } from "./types.js";

/** Caddy server a route is written to. */
export function serverNameOf(params: ProxyRouteParameters): string {
  return params.serverName ?? config.caddy.defaultServerName;
}

function toLoadBalancing(lb: LoadBalancing): CaddyLoadBalancing {
  const out: CaddyLoadBalancing = {};
  if (lb.policy !== undefined) out.selection_policy = { policy: lb.policy };
  if (lb.tryDuration !== undefined) out.try_duration = lb.tryDuration;
  if (lb.tryInterval !== undefined) out.try_interval = lb.tryInterval;
  return out;
}

function toHeaderOps(ops: HeaderManipulation): CaddyHeaderOps {
  const out: CaddyHeaderOps = {};
  if (ops.set !== undefined) out.set = ops.set;
  if (ops.add !== undefined) out.add = ops.add;
  if (ops.delete !== undefined) out.delete = ops.delete;
  return out;
}

function toHealthChecks(hc: HealthChecks): CaddyHealthChecks {
  const out: CaddyHealthChecks = {};
  if (hc.active) {
    const { path, interval, timeout } = hc.active;
    out.active = {};
    if (path !== undefined) out.active.path = path;
    if (interval !== undefined) out.active.interval = interval;
    if (timeout !== undefined) out.active.timeout = timeout;
  }
  if (hc.passive) {
    const { maxFails, unhealthyLatency } = hc.passive;
    out.passive = {};
    if (maxFails !== undefined) out.passive.max_fails = maxFails;
    if (unhealthyLatency !== undefined) out.passive.unhealthy_latency = unhealthyLatency;
  }
  return out;
}

/**
 * Translate desired state into the Caddy route it should produce.
 *
 * Always a single terminal route with one reverse_proxy handler. Optional
 * fields appear in the output exactly when they are set in the input.
 */
export function toCaddyRoute(params: ProxyRouteParameters): CaddyRoute {
  const handler: CaddyHandler = {
    handler: "reverse_proxy",
    upstreams: params.upstreams.map((u) => {
      const upstream: CaddyUpstream = { dial: u.dial };
      if (u.maxRequests !== undefined) upstream.max_requests = u.maxRequests;
      return upstream;
    }),
  };

  if (params.loadBalancing) {
    handler.load_balancing = toLoadBalancing(params.loadBalancing);
  }

  if (params.headers) {
    const { request, response } = params.headers;
    handler.headers = {};
    if (request) handler.headers.request = toHeaderOps(request);
    if (response) handler.headers.response = toHeaderOps(response);
  }

  if (params.healthChecks) {
    handler.health_checks = toHealthChecks(params.healthChecks);
  }

  // Transport is only emitted for TLS upstreams; Caddy defaults to plain HTTP.
  if (params.tls?.enabled === true) {
    const { serverName, insecureSkipVerify } = params.tls;
    const tls: NonNullable<CaddyTransport["tls"]> = {};
    if (serverName !== undefined) tls.server_name = serverName;
    if (insecureSkipVerify !== undefined) tls.insecure_skip_verify = insecureSkipVerify;
    handler.transport = { protocol: "http", tls };
  }

  const route: CaddyRoute = { handle: [handler], terminal: true };

  if (params.match) {
    const { host, path, method, headers } = params.match;
    const matchSet: CaddyMatchSet = {};
    if (host !== undefined) matchSet.host = host;
    if (path !== undefined) matchSet.path = path;
    if (method !== undefined) matchSet.method = method;
    if (headers !== undefined) matchSet.header = headers;
    route.match = [matchSet];
  }

  return route;
}

export function toUpstreamStatuses(upstreams: UpstreamHealth[]): UpstreamStatus[] {
  return upstreams.map((u) => ({
    address: u.address,
    healthy: u.healthy,
    numRequests: u.num_requests,
  }));
}

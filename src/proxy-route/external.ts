import type { FetchFn } from "../caddy/client.js";
import { CaddyAdminClient } from "../caddy/client.js";
import { NotFoundError } from "../caddy/errors.js";
import { logger } from "../config/logger.js";
import { available, creating, deleting, setConditions } from "./conditions.js";
import { serverNameOf, toCaddyRoute, toUpstreamStatuses } from "./convert.js";
import { getExternalName, setExternalName } from "./meta.js";
import type { ProxyRoute } from "./types.js";

export const errGetRoute = "cannot get proxy route";
export const errCreateRoute = "cannot create proxy route";
export const errUpdateRoute = "cannot update proxy route";
export const errDeleteRoute = "cannot delete proxy route";

/** Result of comparing a resource against the external system. */
export interface ExternalObservation {
  resourceExists: boolean;
  resourceUpToDate: boolean;
}

/** Observes, then creates, updates or deletes the external counterpart of a managed resource. */
export interface ExternalClient<T> {
  observe(mg: T, signal?: AbortSignal): Promise<ExternalObservation>;
  create(mg: T, signal?: AbortSignal): Promise<void>;
  update(mg: T, signal?: AbortSignal): Promise<void>;
  delete(mg: T, signal?: AbortSignal): Promise<void>;
  disconnect(): Promise<void>;
}

/** Produces an ExternalClient for one reconciliation of one resource. */
export interface ExternalConnector<T> {
  connect(mg: T): ExternalClient<T>;
}

function wrapError(err: unknown, message: string): Error {
  const detail = err instanceof Error ? err.message : String(err);
  return new Error(`${message}: ${detail}`, { cause: err });
}

export interface ProxyRouteConnectorOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/** Builds a fresh Caddy admin client per reconciliation from the resource's endpoint. */
export class ProxyRouteConnector implements ExternalConnector<ProxyRoute> {
  constructor(private readonly options: ProxyRouteConnectorOptions = {}) {}

  connect(cr: ProxyRoute): ExternalClient<ProxyRoute> {
    const client = new CaddyAdminClient({
      endpoint: cr.spec.forProvider.caddyEndpoint,
      fetchFn: this.options.fetchFn,
      timeoutMs: this.options.timeoutMs,
    });
    return new ProxyRouteExternal(client);
  }
}

/**
 * Reconciles one ProxyRoute against Caddy. Keeps no state between calls:
 * everything lives in the resource's external name and status, and in Caddy.
 */
export class ProxyRouteExternal implements ExternalClient<ProxyRoute> {
  constructor(private readonly client: CaddyAdminClient) {}

  async observe(cr: ProxyRoute, signal?: AbortSignal): Promise<ExternalObservation> {
    const routeId = getExternalName(cr);
    if (!routeId) {
      return { resourceExists: false, resourceUpToDate: false };
    }

    const serverName = serverNameOf(cr.spec.forProvider);
    try {
      await this.client.getRoute(serverName, routeId, signal);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return { resourceExists: false, resourceUpToDate: false };
      }
      throw wrapError(err, errGetRoute);
    }

    cr.status.atProvider.routeId = routeId;

    try {
      const upstreams = await this.client.getUpstreamHealth(signal);
      cr.status.atProvider.upstreamStatuses = toUpstreamStatuses(upstreams);
    } catch (err) {
      logger.warn(`Failed to get upstream status for ${cr.metadata.name}`, { err });
    }

    cr.status.conditions = setConditions(cr.status.conditions, available());

    // No field-level comparison: every cycle that finds the route resyncs it.
    return { resourceExists: true, resourceUpToDate: false };
  }

  async create(cr: ProxyRoute, signal?: AbortSignal): Promise<void> {
    cr.status.conditions = setConditions(cr.status.conditions, creating());

    const params = cr.spec.forProvider;
    let routeId: string;
    try {
      routeId = await this.client.createRoute(serverNameOf(params), toCaddyRoute(params), signal);
    } catch (err) {
      throw wrapError(err, errCreateRoute);
    }

    setExternalName(cr, routeId);
  }

  /** Replaces the route in place. The external name is never rotated, even if the match conditions changed. */
  async update(cr: ProxyRoute, signal?: AbortSignal): Promise<void> {
    const params = cr.spec.forProvider;
    const routeId = getExternalName(cr) ?? "";
    try {
      await this.client.updateRoute(serverNameOf(params), routeId, toCaddyRoute(params), signal);
    } catch (err) {
      throw wrapError(err, errUpdateRoute);
    }
  }

  async delete(cr: ProxyRoute, signal?: AbortSignal): Promise<void> {
    cr.status.conditions = setConditions(cr.status.conditions, deleting());

    const routeId = getExternalName(cr);
    if (!routeId) return;

    try {
      await this.client.deleteRoute(serverNameOf(cr.spec.forProvider), routeId, signal);
    } catch (err) {
      throw wrapError(err, errDeleteRoute);
    }
  }

  async disconnect(): Promise<void> {
    // The admin client holds no connection of its own.
  }
}

import type { z } from "zod";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { BackendError, EncodingError, NotFoundError, TransportError } from "./errors.js";
import { routeId } from "./route-id.js";
import type { CaddyRoute, UpstreamHealth } from "./types.js";
import { caddyRouteListSchema, upstreamHealthListSchema } from "./types.js";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface CaddyAdminClientOptions {
  /** Caddy admin API base URL, e.g. "http://localhost:2019". */
  endpoint: string;
  /** Replaces the global fetch (tests, custom agents). */
  fetchFn?: FetchFn;
  /** Per-exchange timeout (default: config.caddy.requestTimeoutMs). */
  timeoutMs?: number;
}

function routesPath(serverName: string): string {
  return `/config/apps/http/servers/${encodeURIComponent(serverName)}/routes`;
}

/**
 * Client for the route endpoints of the Caddy admin API.
 *
 * Holds nothing but the base endpoint; every call re-reads remote state.
 * Routes are addressed by {@link routeId}, recomputed from whatever the
 * server currently stores, because Caddy keeps no IDs of its own for them.
 */
export class CaddyAdminClient {
  private readonly endpoint: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(options: CaddyAdminClientOptions) {
    this.endpoint = options.endpoint.replace(/\/$/, "");
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? config.caddy.requestTimeoutMs;
  }

  /**
   * List the server's routes in array order.
   * Throws {@link NotFoundError} when the routes array endpoint is missing.
   */
  async listRoutes(serverName: string, signal?: AbortSignal): Promise<CaddyRoute[]> {
    return this.exchange("GET", routesPath(serverName), signal, async (res) => {
      if (res.status === 404) {
        await res.body?.cancel();
        throw new NotFoundError(`routes of server "${serverName}"`);
      }
      await this.ensureOk(res);
      return this.decode(res, caddyRouteListSchema);
    });
  }

  /**
   * Append a route to the server's routes array. Not idempotent: calling it
   * twice appends twice. Returns the route's computed identifier.
   */
  async createRoute(serverName: string, route: CaddyRoute, signal?: AbortSignal): Promise<string> {
    let body: string;
    try {
      body = JSON.stringify(route);
    } catch (err) {
      throw new EncodingError("failed to encode route", err);
    }

    await this.exchange(
      "POST",
      routesPath(serverName),
      signal,
      async (res) => {
        await this.ensureOk(res);
        await res.body?.cancel();
      },
      body,
    );

    const id = routeId(route);
    logger.info(`Created Caddy route ${id} on server ${serverName}`);
    return id;
  }

  /**
   * Delete the first route whose identifier matches. A missing routes array
   * or no matching entry counts as already deleted.
   *
   * The entry is removed by its index at list time; if the array changes
   * between the list and the delete, another route may be removed instead.
   */
  async deleteRoute(serverName: string, id: string, signal?: AbortSignal): Promise<void> {
    let routes: CaddyRoute[];
    try {
      routes = await this.listRoutes(serverName, signal);
    } catch (err) {
      if (err instanceof NotFoundError) return;
      throw err;
    }

    const index = routes.findIndex((r) => routeId(r) === id);
    if (index === -1) {
      logger.debug(`Caddy route ${id} not present on server ${serverName}, nothing to delete`);
      return;
    }

    await this.exchange("DELETE", `${routesPath(serverName)}/${index}`, signal, async (res) => {
      await this.ensureOk(res);
      await res.body?.cancel();
    });
    logger.info(`Deleted Caddy route ${id} at index ${index} on server ${serverName}`);
  }

  /** Find a route by identifier. Throws {@link NotFoundError} when absent. */
  async getRoute(serverName: string, id: string, signal?: AbortSignal): Promise<CaddyRoute> {
    const routes = await this.listRoutes(serverName, signal);
    const route = routes.find((r) => routeId(r) === id);
    if (!route) {
      throw new NotFoundError(`route "${id}" on server "${serverName}"`);
    }
    return route;
  }

  /**
   * Replace a route by deleting it and appending the new one. Not atomic:
   * if the create fails, the old route is already gone.
   */
  async updateRoute(serverName: string, id: string, route: CaddyRoute, signal?: AbortSignal): Promise<void> {
    await this.deleteRoute(serverName, id, signal);
    try {
      await this.createRoute(serverName, route, signal);
    } catch (err) {
      logger.error(`Caddy route ${id} was deleted but its replacement could not be created`, {
        err,
        serverName,
      });
      throw err;
    }
  }

  /** Proxy-wide upstream health snapshot; not scoped to any route or server. */
  async getUpstreamHealth(signal?: AbortSignal): Promise<UpstreamHealth[]> {
    return this.exchange("GET", "/reverse_proxy/upstreams", signal, async (res) => {
      await this.ensureOk(res);
      return this.decode(res, upstreamHealthListSchema);
    });
  }

  /**
   * Run one request and hand the response to `read`. The timeout and the
   * caller's signal stay armed until `read` settles, so a body that stalls
   * mid-stream is cut off like a request that never answers.
   */
  private async exchange<T>(
    method: string,
    path: string,
    signal: AbortSignal | undefined,
    read: (res: Response) => Promise<T>,
    body?: string,
  ): Promise<T> {
    const url = `${this.endpoint}${path}`;
    const controller = new AbortController();
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });
    const timeoutId = setTimeout(
      () => controller.abort(new Error(`request timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs,
    );
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    logger.debug(`Caddy admin ${method} ${url}`);
    try {
      let res: Response;
      try {
        res = await Promise.race([
          this.fetchFn(url, {
            method,
            headers: body === undefined ? undefined : { "Content-Type": "application/json" },
            body,
            signal: controller.signal,
          }),
          aborted,
        ]);
      } catch (err) {
        throw new TransportError(method, url, err);
      }

      try {
        return await Promise.race([read(res), aborted]);
      } catch (err) {
        if (controller.signal.aborted) {
          throw new TransportError(method, url, controller.signal.reason);
        }
        throw err;
      }
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async ensureOk(res: Response): Promise<void> {
    if (res.ok) return;
    const body = await res.text().catch(() => "");
    throw new BackendError(res.status, body.trim());
  }

  private async decode<S extends z.ZodTypeAny>(res: Response, schema: S): Promise<z.output<S>> {
    let raw: unknown;
    try {
      raw = await res.json();
    } catch (err) {
      throw new EncodingError("Caddy admin API returned a body that is not JSON", err);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new EncodingError(`Caddy admin API returned an unexpected shape: ${parsed.error.message}`, parsed.error);
    }
    return parsed.data;
  }
}

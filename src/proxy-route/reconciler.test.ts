import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { getCondition } from "./conditions.js";
import type { ExternalClient, ExternalConnector, ExternalObservation } from "./external.js";
import { setExternalName } from "./meta.js";
import { ProxyRouteReconciler } from "./reconciler.js";
import type { ProxyRoute } from "./types.js";
import { parseProxyRoute, TypeMismatchError } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

function makeProxyRoute(overrides: { deletionPolicy?: "Delete" | "Orphan"; deleted?: boolean } = {}): ProxyRoute {
  const cr = parseProxyRoute({
    kind: "ProxyRoute",
    metadata: {
      name: "shop",
      ...(overrides.deleted ? { deletionTimestamp: "2026-01-01T00:00:00Z" } : {}),
    },
    spec: {
      forProvider: { caddyEndpoint: "http://localhost:2019", upstreams: [{ dial: "b:80" }] },
      ...(overrides.deletionPolicy ? { deletionPolicy: overrides.deletionPolicy } : {}),
    },
  });
  setExternalName(cr, "host:a.com");
  return cr;
}

function makeExternal(observation: ExternalObservation) {
  return {
    observe: vi.fn<ExternalClient<ProxyRoute>["observe"]>().mockResolvedValue(observation),
    create: vi.fn<ExternalClient<ProxyRoute>["create"]>().mockResolvedValue(undefined),
    update: vi.fn<ExternalClient<ProxyRoute>["update"]>().mockResolvedValue(undefined),
    delete: vi.fn<ExternalClient<ProxyRoute>["delete"]>().mockResolvedValue(undefined),
    disconnect: vi.fn<ExternalClient<ProxyRoute>["disconnect"]>().mockResolvedValue(undefined),
  };
}

function makeReconciler(external: ExternalClient<ProxyRoute>) {
  const connector: ExternalConnector<ProxyRoute> = { connect: vi.fn(() => external) };
  return { reconciler: new ProxyRouteReconciler(connector), connector };
}

describe("ProxyRouteReconciler", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("creates a route that does not exist", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);

    await expect(reconciler.reconcile(makeProxyRoute())).resolves.toBe("create");
    expect(external.create).toHaveBeenCalledOnce();
    expect(external.update).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("Reconciled ProxyRoute shop: create");
  });

  it("updates a route that exists but is not up to date", async () => {
    const external = makeExternal({ resourceExists: true, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);

    await expect(reconciler.reconcile(makeProxyRoute())).resolves.toBe("update");
    expect(external.update).toHaveBeenCalledOnce();
    expect(external.create).not.toHaveBeenCalled();
  });

  it("does nothing for a route that is up to date", async () => {
    const external = makeExternal({ resourceExists: true, resourceUpToDate: true });
    const { reconciler } = makeReconciler(external);

    await expect(reconciler.reconcile(makeProxyRoute())).resolves.toBe("none");
    expect(external.create).not.toHaveBeenCalled();
    expect(external.update).not.toHaveBeenCalled();
    expect(external.delete).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("deletes an existing route once the resource is being deleted", async () => {
    const external = makeExternal({ resourceExists: true, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);

    await expect(reconciler.reconcile(makeProxyRoute({ deleted: true }))).resolves.toBe("delete");
    expect(external.delete).toHaveBeenCalledOnce();
    expect(external.update).not.toHaveBeenCalled();
  });

  it("skips delete when the route is already gone", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);

    await expect(reconciler.reconcile(makeProxyRoute({ deleted: true }))).resolves.toBe("none");
    expect(external.delete).not.toHaveBeenCalled();
    expect(external.create).not.toHaveBeenCalled();
  });

  it("leaves the route in Caddy under the Orphan deletion policy", async () => {
    const external = makeExternal({ resourceExists: true, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);

    const cr = makeProxyRoute({ deleted: true, deletionPolicy: "Orphan" });

    await expect(reconciler.reconcile(cr)).resolves.toBe("none");
    expect(external.delete).not.toHaveBeenCalled();
  });

  it("passes the abort signal to every external call", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);
    const signal = new AbortController().signal;
    const cr = makeProxyRoute();

    await reconciler.reconcile(cr, signal);

    expect(external.observe).toHaveBeenCalledWith(cr, signal);
    expect(external.create).toHaveBeenCalledWith(cr, signal);
  });

  it("marks a successful pass as synced", async () => {
    const external = makeExternal({ resourceExists: true, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);
    const cr = makeProxyRoute();

    await reconciler.reconcile(cr);

    expect(getCondition(cr.status.conditions, "Synced")).toMatchObject({
      status: "True",
      reason: "ReconcileSuccess",
    });
  });

  it("records, logs and rethrows a failed pass", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const failure = new Error("cannot create proxy route: connection refused");
    external.create.mockRejectedValue(failure);
    const { reconciler } = makeReconciler(external);
    const cr = makeProxyRoute();

    await expect(reconciler.reconcile(cr)).rejects.toBe(failure);
    expect(getCondition(cr.status.conditions, "Synced")).toMatchObject({
      status: "False",
      reason: "ReconcileError",
      message: "cannot create proxy route: connection refused",
    });
    expect(logger.error).toHaveBeenCalledWith("Failed to reconcile ProxyRoute shop", { err: failure });
  });

  it("does not act when observe fails", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    external.observe.mockRejectedValue(new Error("cannot get proxy route: timeout"));
    const { reconciler } = makeReconciler(external);

    await expect(reconciler.reconcile(makeProxyRoute())).rejects.toThrow("cannot get proxy route: timeout");
    expect(external.create).not.toHaveBeenCalled();
  });

  it("disconnects after success and after failure", async () => {
    const ok = makeExternal({ resourceExists: true, resourceUpToDate: true });
    await makeReconciler(ok).reconciler.reconcile(makeProxyRoute());
    expect(ok.disconnect).toHaveBeenCalledOnce();

    const failing = makeExternal({ resourceExists: true, resourceUpToDate: false });
    failing.update.mockRejectedValue(new Error("boom"));
    await expect(makeReconciler(failing).reconciler.reconcile(makeProxyRoute())).rejects.toThrow("boom");
    expect(failing.disconnect).toHaveBeenCalledOnce();
  });

  it("rejects a resource of another kind before connecting", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const { reconciler, connector } = makeReconciler(external);

    await expect(reconciler.reconcile({ kind: "Certificate", metadata: { name: "tls" } })).rejects.toBeInstanceOf(
      TypeMismatchError,
    );
    expect(connector.connect).not.toHaveBeenCalled();
    expect(external.observe).not.toHaveBeenCalled();
  });

  it("rejects an unparsed ProxyRoute manifest before connecting", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const { reconciler, connector } = makeReconciler(external);

    await expect(reconciler.reconcile({ kind: "ProxyRoute", metadata: { name: "x" } })).rejects.toThrow(
      new TypeMismatchError("ProxyRoute", "spec: Required"),
    );
    expect(connector.connect).not.toHaveBeenCalled();
  });

  it("reconciles a raw manifest and writes status back onto it", async () => {
    const external = makeExternal({ resourceExists: false, resourceUpToDate: false });
    const { reconciler } = makeReconciler(external);
    const manifest = {
      kind: "ProxyRoute",
      metadata: { name: "shop" },
      spec: { forProvider: { caddyEndpoint: "http://localhost:2019", upstreams: [{ dial: "b:80" }] } },
    };

    await expect(reconciler.reconcile(manifest)).resolves.toBe("create");
    expect(manifest).toMatchObject({
      status: { conditions: [expect.objectContaining({ type: "Synced", reason: "ReconcileSuccess" })] },
    });
  });
});

import { logger } from "../config/logger.js";
import { reconcileError, reconcileSuccess, setConditions } from "./conditions.js";
import type { ExternalClient, ExternalConnector } from "./external.js";
import type { Managed, ProxyRoute } from "./types.js";
import { asProxyRoute } from "./types.js";

export type ReconcileAction = "none" | "create" | "update" | "delete";

/**
 * Runs one reconciliation pass for a ProxyRoute: observe, then at most one
 * of create, update or delete.
 *
 * Callers own scheduling: they must not run two passes for the same resource
 * at once, and they decide when to retry after an error. Nothing is retried
 * here.
 */
export class ProxyRouteReconciler {
  constructor(private readonly connector: ExternalConnector<ProxyRoute>) {}

  async reconcile(mg: Managed, signal?: AbortSignal): Promise<ReconcileAction> {
    const cr = asProxyRoute(mg);
    const external = this.connector.connect(cr);

    try {
      const action = await this.converge(cr, external, signal);
      cr.status.conditions = setConditions(cr.status.conditions, reconcileSuccess());
      if (action !== "none") {
        logger.info(`Reconciled ProxyRoute ${cr.metadata.name}: ${action}`);
      }
      return action;
    } catch (err) {
      cr.status.conditions = setConditions(cr.status.conditions, reconcileError(err));
      logger.error(`Failed to reconcile ProxyRoute ${cr.metadata.name}`, { err });
      throw err;
    } finally {
      await external.disconnect();
    }
  }

  private async converge(
    cr: ProxyRoute,
    external: ExternalClient<ProxyRoute>,
    signal?: AbortSignal,
  ): Promise<ReconcileAction> {
    const observation = await external.observe(cr, signal);

    if (cr.metadata.deletionTimestamp) {
      if (cr.spec.deletionPolicy === "Orphan" || !observation.resourceExists) {
        return "none";
      }
      await external.delete(cr, signal);
      return "delete";
    }

    if (!observation.resourceExists) {
      await external.create(cr, signal);
      return "create";
    }

    if (!observation.resourceUpToDate) {
      await external.update(cr, signal);
      return "update";
    }

    return "none";
  }
}

import type { Condition, ConditionType } from "./types.js";

type ConditionInput = Omit<Condition, "lastTransitionTime">;

function condition(input: ConditionInput): Condition {
  return { ...input, lastTransitionTime: new Date().toISOString() };
}

/** The route exists in Caddy and is serving. */
export function available(): Condition {
  return condition({ type: "Ready", status: "True", reason: "Available" });
}

export function creating(): Condition {
  return condition({ type: "Ready", status: "False", reason: "Creating" });
}

export function deleting(): Condition {
  return condition({ type: "Ready", status: "False", reason: "Deleting" });
}

export function reconcileSuccess(): Condition {
  return condition({ type: "Synced", status: "True", reason: "ReconcileSuccess" });
}

export function reconcileError(err: unknown): Condition {
  return condition({
    type: "Synced",
    status: "False",
    reason: "ReconcileError",
    message: err instanceof Error ? err.message : String(err),
  });
}

export function getCondition(conditions: readonly Condition[], type: ConditionType): Condition | undefined {
  return conditions.find((c) => c.type === type);
}

/**
 * Merge conditions into a list, one per type. A condition equal to the
 * existing one in status, reason and message keeps the original
 * lastTransitionTime.
 */
export function setConditions(existing: readonly Condition[], ...updates: Condition[]): Condition[] {
  const next = [...existing];
  for (const update of updates) {
    const index = next.findIndex((c) => c.type === update.type);
    if (index === -1) {
      next.push(update);
      continue;
    }
    const current = next[index];
    const unchanged =
      current.status === update.status && current.reason === update.reason && current.message === update.message;
    next[index] = unchanged ? current : update;
  }
  return next;
}

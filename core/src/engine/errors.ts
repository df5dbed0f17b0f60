/**
 * Engine errors.
 *
 * Unknown ids are not errors anywhere in the engine; these cover broken
 * invariants and misuse of the engine lifecycle.
 */

import type { NotificationState } from "../notifications/types.js";

export class InvalidTransitionError extends Error {
  constructor(
    readonly notificationId: number,
    readonly from: NotificationState | "missing",
    readonly to: NotificationState | "removed",
  ) {
    super(`notification ${notificationId}: cannot go from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class EngineNotRunningError extends Error {
  constructor(operation: string) {
    super(`engine is not running (${operation})`);
    this.name = "EngineNotRunningError";
  }
}

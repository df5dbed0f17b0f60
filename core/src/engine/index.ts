/**
 * @xnotid/core/engine — barrel export
 */

export {
  NotificationEngine,
  type EngineEvent,
  type EngineListener,
  type EngineSnapshot,
  type EngineStatus,
  type NotificationEngineOptions,
  type PopupState,
} from "./notification-engine.js";

export { NotificationStore, type NotificationFields, type NotificationStoreOptions } from "./notification-store.js";
export { NotificationCenter, snapshotEntry } from "./notification-center.js";
export { PopupSlots, type SlotAssignment } from "./popup-slots.js";
export { SerialQueue, type SerialQueueOptions } from "./serial-queue.js";
export {
  TimeoutScheduler,
  resolveTimeout,
  MAX_TIMER_DELAY_MS,
  type TimeoutSchedulerOptions,
} from "./timeout-scheduler.js";
export { InvalidTransitionError, EngineNotRunningError } from "./errors.js";

/**
 * Notification Engine
 *
 * Owns every piece of mutable notification state: the store, popup slots,
 * expiry timers, the promotion queue and the notification center. Protocol
 * calls, renderer feedback and timer fires all enter through one serial
 * queue. Events produced by a mutation are buffered and delivered once the
 * queue is idle, so listeners are free to call back into the engine.
 */

import type {
  CenterEntry,
  CloseReason,
  NotificationRequest,
  NotificationState,
  NotificationView,
  RenderIntent,
} from "../notifications/types.js";
import { parseNotificationDetails } from "../notifications/hints.js";
import { parseCard } from "../cards/card-parser.js";
import { buildChoiceResponse, cardActionKeys } from "../cards/card-response.js";
import type { EngineConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { getErrorMessage } from "../logging/error-utils.js";
import { EngineNotRunningError } from "./errors.js";
import { NotificationStore, type NotificationFields } from "./notification-store.js";
import { NotificationCenter, snapshotEntry } from "./notification-center.js";
import { PopupSlots } from "./popup-slots.js";
import { SerialQueue } from "./serial-queue.js";
import { TimeoutScheduler, resolveTimeout } from "./timeout-scheduler.js";

export type EngineStatus = "created" | "running" | "stopped";

export type EngineEvent =
  | { type: "notification_received"; notification: NotificationView; replaced: boolean }
  | { type: "notification_closed"; id: number; reason: CloseReason; notification: NotificationView }
  | { type: "action_invoked"; id: number; actionKey: string; notification: NotificationView }
  | { type: "render"; intent: RenderIntent }
  | { type: "dnd_changed"; enabled: boolean };

export type EngineListener = (event: EngineEvent) => void;

export interface PopupState {
  slot: number;
  notification: NotificationView;
}

export interface EngineSnapshot {
  status: EngineStatus;
  popups: PopupState[];
  center: CenterEntry[];
  centerVisible: boolean;
  doNotDisturb: boolean;
  /** Archived ids in promotion order */
  queued: number[];
}

export interface NotificationEngineOptions {
  config: EngineConfig;
  logger?: Logger;
  /** Clock for record and center timestamps */
  now?: () => number;
}

/** State a visible record passes through on its way to `closed`. */
const OUTCOME_BY_REASON: Record<CloseReason, NotificationState> = {
  expired: "expired",
  dismissed: "dismissed",
  closed: "closed",
  undefined: "closed",
};

export class NotificationEngine {
  private config: EngineConfig;
  private logger: Logger;
  private now: () => number;

  private store: NotificationStore;
  private slots: PopupSlots;
  private center = new NotificationCenter();
  private scheduler: TimeoutScheduler;
  private queue: SerialQueue;

  /** Archived ids waiting for a slot, oldest first */
  private promotionQueue: number[] = [];
  /** Visible ids whose expiry is paused under the pointer */
  private hovered = new Set<number>();
  private doNotDisturb = false;
  private status: EngineStatus = "created";

  private listeners = new Set<EngineListener>();
  private outbox: EngineEvent[] = [];
  private flushing = false;

  constructor(options: NotificationEngineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger({ silent: true });
    this.now = options.now ?? Date.now;

    this.store = new NotificationStore({ now: this.now });
    this.slots = new PopupSlots(options.config.maxVisible);
    this.queue = new SerialQueue({
      onIdle: () => this.flush(),
      logger: this.logger,
    });
    this.scheduler = new TimeoutScheduler({
      onExpire: (id) => this.handleExpiry(id),
      logger: this.logger,
    });
  }

  private get log() { return this.logger.log.bind(this.logger); }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  get state(): EngineStatus {
    return this.status;
  }

  start(): void {
    if (this.status !== "created") {
      this.logger.warn(`[Engine] start() ignored: engine is ${this.status}`);
      return;
    }
    this.status = "running";
    this.log(`[Engine] Running with ${this.config.maxVisible} popup slot(s)`);
  }

  shutdown(): void {
    if (this.status === "stopped") return;
    this.status = "stopped";
    this.scheduler.disarmAll();
    this.hovered.clear();
    this.log(`[Engine] Stopped with ${this.store.size} live notification(s)`);
  }

  /** Register for engine events. Returns an unsubscribe function. */
  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  /**
   * Create or replace a notification and return its id.
   * A non-zero `replacesId` that is live is updated in place; anything else
   * mints a fresh id.
   */
  notify(request: NotificationRequest): number {
    if (this.status !== "running") {
      throw new EngineNotRunningError("notify");
    }
    return this.queue.run(() => this.applyNotify(request));
  }

  /**
   * Close a notification for the given reason. Unknown ids are a no-op.
   * Bus requests and renderer dismissals both end up here.
   */
  close(id: number, reason: CloseReason): void {
    this.mutate("close", undefined, () => this.closeRecord(id, reason));
  }

  /** CloseNotification from a client. */
  closeNotification(id: number): void {
    this.close(id, "closed");
  }

  /** The user dismissed a popup. */
  dismiss(id: number): void {
    this.close(id, "dismissed");
  }

  /**
   * Record a user action. Keys the notification never offered are ignored.
   * Acknowledge-to-dismiss notifications close right after the action.
   */
  invokeAction(id: number, actionKey: string): void {
    this.mutate("invokeAction", undefined, () => {
      const record = this.store.get(id);
      if (!record) {
        this.logger.debug(`[Engine] Action "${actionKey}" for unknown notification ${id}`);
        return;
      }
      if (!this.allowedActionKeys(record).includes(actionKey)) {
        this.logger.debug(`[Engine] Notification ${id} has no action "${actionKey}"`);
        return;
      }
      this.applyAction(record, actionKey);
    });
  }

  /**
   * Answer a multiple-choice card. Throws InvalidCardResponseError for a
   * selection the card cannot produce; engine state is untouched then.
   */
  submitChoices(id: number, selectedIds: readonly string[], other: string | null): void {
    this.mutate("submitChoices", undefined, () => {
      const record = this.store.get(id);
      if (!record) {
        this.logger.debug(`[Engine] Choices for unknown notification ${id}`);
        return;
      }
      const card = record.card;
      if (!card || card.type !== "multiple-choice") {
        this.logger.debug(`[Engine] Notification ${id} has no multiple-choice card`);
        return;
      }
      this.applyAction(record, buildChoiceResponse(card, selectedIds, other));
    });
  }

  /** Flip center visibility. Returns the new visibility. */
  toggleCenter(): boolean {
    return this.mutate("toggleCenter", this.center.isVisible(), () => {
      const visible = this.center.toggleVisibility();
      this.emitRender(visible
        ? { type: "show_center", entries: this.center.entries() }
        : { type: "hide_center" });
      return visible;
    });
  }

  /** Remove one center entry; a still-archived record is closed as dismissed. */
  acknowledge(id: number): void {
    this.mutate("acknowledge", undefined, () => {
      const removed = this.center.acknowledge(id);
      this.discardArchived(id);
      if (removed) this.refreshCenter();
    });
  }

  /** Empty the center, closing every archived record as dismissed. */
  clearCenter(): void {
    this.mutate("clearCenter", undefined, () => {
      const removed = this.center.clearAll();
      for (const entry of removed) {
        this.discardArchived(entry.id);
      }
      if (removed.length > 0) this.refreshCenter();
    });
  }

  /** Returns the resulting do-not-disturb state. */
  setDoNotDisturb(enabled: boolean): boolean {
    return this.mutate("setDoNotDisturb", this.doNotDisturb, () => {
      if (enabled && !this.config.dndEnabled) {
        this.logger.warn("[Engine] Do-not-disturb is disabled in the configuration");
        return this.doNotDisturb;
      }
      if (this.doNotDisturb === enabled) return enabled;

      this.doNotDisturb = enabled;
      this.log(`[Engine] Do-not-disturb ${enabled ? "on" : "off"}`);
      this.emit({ type: "dnd_changed", enabled });
      if (!enabled) this.fillFreeSlots();
      return enabled;
    });
  }

  toggleDoNotDisturb(): boolean {
    return this.setDoNotDisturb(!this.doNotDisturb);
  }

  /** Pointer entered a popup: hold its expiry. */
  pauseExpiry(id: number): void {
    this.mutate("pauseExpiry", undefined, () => {
      if (!this.config.hoverPause) return;
      const record = this.store.get(id);
      if (record?.state !== "visible") return;

      this.hovered.add(id);
      this.scheduler.disarm(id);
    });
  }

  /** Pointer left a popup: restart its full expiry. */
  resumeExpiry(id: number): void {
    this.mutate("resumeExpiry", undefined, () => {
      if (!this.hovered.delete(id)) return;
      const record = this.store.get(id);
      if (record?.state !== "visible") return;

      this.armExpiry(record);
    });
  }

  getNotification(id: number): NotificationView | undefined {
    return this.store.get(id);
  }

  snapshot(): EngineSnapshot {
    const popups: PopupState[] = [];
    for (const { id, slot } of this.slots.entries()) {
      const notification = this.store.get(id);
      if (notification) popups.push({ slot, notification });
    }
    return {
      status: this.status,
      popups,
      center: this.center.entries(),
      centerVisible: this.center.isVisible(),
      doNotDisturb: this.doNotDisturb,
      queued: [...this.promotionQueue],
    };
  }

  // ---------------------------------------------------------------------------
  // Mutations (always inside the queue)
  // ---------------------------------------------------------------------------

  private mutate<T>(operation: string, fallback: T, task: () => T): T {
    if (this.status !== "running") {
      this.logger.warn(`[Engine] ${operation}() ignored: engine is ${this.status}`);
      return fallback;
    }
    return this.queue.run(task);
  }

  private applyNotify(request: NotificationRequest): number {
    const fields = this.buildFields(request);

    if (request.replacesId !== 0) {
      const replaced = this.store.replace(request.replacesId, fields);
      if (replaced) {
        this.applyReplace(replaced);
        return replaced.id;
      }
    }

    const created = this.store.create(fields);
    this.emit({ type: "notification_received", notification: created, replaced: false });
    this.admit(created);
    return created.id;
  }

  private buildFields(request: NotificationRequest): NotificationFields {
    const details = parseNotificationDetails(request.hints, request.icon);
    const parsed = parseCard(request.body);
    if (parsed.kind === "malformed") {
      this.logger.warn(
        `[Engine] Malformed card from ${request.appName || "unknown app"}, showing as text: ${parsed.error.message}`,
      );
    }
    const card = parsed.kind === "card" ? parsed.card : null;

    return {
      appName: request.appName,
      summary: request.summary,
      body: request.body,
      icon: request.icon,
      actions: request.actions.map((action) => ({ ...action })),
      hints: { ...request.hints },
      expireTimeout: request.expireTimeout,
      details,
      card,
      acknowledgeToDismiss: details.acknowledge || card !== null,
    };
  }

  private admit(notification: NotificationView): void {
    if (this.doNotDisturb && notification.details.urgency !== "critical") {
      this.archive(notification);
      return;
    }

    const slot = this.slots.acquire(notification.id);
    if (slot === null) {
      this.archive(notification);
      return;
    }
    this.showInSlot(notification.id, slot);
  }

  private applyReplace(notification: NotificationView): void {
    const { id } = notification;
    this.emit({ type: "notification_received", notification, replaced: true });

    if (notification.state === "visible") {
      const slot = this.slots.slotOf(id);
      if (slot !== undefined) {
        this.emitRender({ type: "update_popup", notification, slot });
      }
      this.armExpiry(notification);
      return;
    }

    // Archived: take a slot now if one is open to it, else refresh the center
    if (this.canShowNow(notification)) {
      const slot = this.slots.acquire(id);
      if (slot !== null) {
        this.removeFromPromotionQueue(id);
        this.promote(id, slot);
        return;
      }
    }

    const existing = this.center.get(id);
    const entry = snapshotEntry(notification, "archived", existing?.enqueuedAt ?? this.now());
    if (!this.center.refresh(entry)) {
      this.center.add(entry);
    }
    this.refreshCenter();
  }

  private archive(notification: NotificationView): void {
    const archived = this.store.transition(notification.id, "archived");
    this.promotionQueue.push(archived.id);
    this.center.add(snapshotEntry(archived, "archived", this.now()));
    this.logger.debug(`[Engine] Archived ${archived.id} (${this.promotionQueue.length} waiting)`);
    this.refreshCenter();
  }

  private showInSlot(id: number, slot: number): void {
    const shown = this.store.transition(id, "visible");
    this.emitRender({ type: "show_popup", notification: shown, slot });
    this.armExpiry(shown);
  }

  private promote(id: number, slot: number): void {
    this.center.acknowledge(id);
    this.showInSlot(id, slot);
    this.refreshCenter();
  }

  private armExpiry(notification: NotificationView): void {
    const { id } = notification;
    if (notification.acknowledgeToDismiss || this.hovered.has(id)) {
      this.scheduler.disarm(id);
      return;
    }

    const duration = resolveTimeout(
      notification.expireTimeout,
      notification.details.urgency,
      this.config.timeouts,
    );
    if (duration === null) {
      this.scheduler.disarm(id);
      return;
    }
    this.scheduler.arm(id, duration);
  }

  private applyAction(record: NotificationView, actionKey: string): void {
    this.emit({ type: "action_invoked", id: record.id, actionKey, notification: record });
    if (record.acknowledgeToDismiss) {
      this.closeRecord(record.id, "dismissed", "action-taken");
    }
  }

  private closeRecord(id: number, reason: CloseReason, outcome?: NotificationState): void {
    const record = this.store.get(id);
    if (!record) {
      this.logger.debug(`[Engine] Close of unknown notification ${id} ignored`);
      return;
    }

    this.scheduler.disarm(id);
    this.hovered.delete(id);

    if (record.state === "archived") {
      this.removeFromPromotionQueue(id);
      const closed = this.store.transition(id, "closed");
      this.store.remove(id);
      if (reason === "dismissed" && this.center.acknowledge(id)) {
        this.refreshCenter();
      }
      this.emit({ type: "notification_closed", id, reason, notification: closed });
      return;
    }

    const passThrough = outcome ?? OUTCOME_BY_REASON[reason];
    if (passThrough !== "closed") {
      this.store.transition(id, passThrough);
    }
    const closed = this.store.transition(id, "closed");
    this.store.remove(id);

    const slot = this.slots.release(id);
    if (slot !== null) {
      this.emitRender({ type: "remove_popup", id, slot });
    }

    if (reason === "expired" && !closed.details.transient) {
      this.center.add(snapshotEntry(closed, "expired", this.now()));
      this.refreshCenter();
    }

    this.emit({ type: "notification_closed", id, reason, notification: closed });
    this.fillFreeSlots();
  }

  /** Delete an archived record straight from the center as a dismissal. */
  private discardArchived(id: number): void {
    const record = this.store.get(id);
    if (record?.state !== "archived") return;

    this.removeFromPromotionQueue(id);
    const removed = this.store.remove(id);
    this.emit({ type: "notification_closed", id, reason: "dismissed", notification: removed });
  }

  private handleExpiry(id: number): void {
    if (this.status !== "running") return;

    this.queue.post(() => {
      const record = this.store.get(id);
      // A newer timer or a close got there first
      if (record?.state !== "visible" || this.scheduler.isArmed(id)) {
        return;
      }
      this.closeRecord(id, "expired");
    });
  }

  /** Promote archived records, oldest first, into every open slot. */
  private fillFreeSlots(): void {
    while (this.slots.hasFree()) {
      const next = this.takeNextPromotable();
      if (next === undefined) return;

      const slot = this.slots.acquire(next);
      if (slot === null) return;
      this.logger.debug(`[Engine] Promoting ${next} into slot ${slot}`);
      this.promote(next, slot);
    }
  }

  private takeNextPromotable(): number | undefined {
    const index = this.promotionQueue.findIndex((id) => {
      if (!this.doNotDisturb) return true;
      return this.store.get(id)?.details.urgency === "critical";
    });
    if (index === -1) return undefined;
    return this.promotionQueue.splice(index, 1)[0];
  }

  private canShowNow(notification: NotificationView): boolean {
    return !this.doNotDisturb || notification.details.urgency === "critical";
  }

  private removeFromPromotionQueue(id: number): void {
    this.promotionQueue = this.promotionQueue.filter((queued) => queued !== id);
  }

  private allowedActionKeys(record: NotificationView): string[] {
    const keys = record.actions.map((action) => action.key);
    if (record.card) {
      keys.push(...cardActionKeys(record.card));
    }
    return keys;
  }

  // ---------------------------------------------------------------------------
  // Event delivery
  // ---------------------------------------------------------------------------

  private refreshCenter(): void {
    if (this.center.isVisible()) {
      this.emitRender({ type: "show_center", entries: this.center.entries() });
    }
  }

  private emitRender(intent: RenderIntent): void {
    this.emit({ type: "render", intent });
  }

  private emit(event: EngineEvent): void {
    this.outbox.push(event);
  }

  private flush(): void {
    if (this.flushing) return;

    this.flushing = true;
    try {
      while (this.outbox.length > 0) {
        const event = this.outbox.shift();
        if (!event) break;
        for (const listener of [...this.listeners]) {
          try {
            listener(event);
          } catch (err) {
            this.logger.error(`[Engine] Listener failed on ${event.type}: ${getErrorMessage(err)}`);
          }
        }
      }
    } finally {
      this.flushing = false;
    }
  }
}

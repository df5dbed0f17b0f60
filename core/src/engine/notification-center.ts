/**
 * Notification Center
 *
 * Ordered backlog of notifications that are not (or no longer) on screen.
 * Entries are frozen snapshots taken when a record is archived or expires,
 * so later changes to the live record never rewrite history.
 */

import type {
  CenterEntry,
  CenterEntryOrigin,
  NotificationView,
} from "../notifications/types.js";

/** Take a center snapshot of a record's display fields. */
export function snapshotEntry(
  notification: NotificationView,
  origin: CenterEntryOrigin,
  enqueuedAt: number,
): CenterEntry {
  return Object.freeze({
    id: notification.id,
    appName: notification.appName,
    summary: notification.summary,
    body: notification.body,
    icon: notification.icon,
    urgency: notification.details.urgency,
    image: notification.details.image,
    card: notification.card,
    actions: Object.freeze(notification.actions.map((action) => Object.freeze({ ...action }))),
    group: notification.details.group,
    origin,
    createdAt: notification.createdAt,
    enqueuedAt,
  });
}

export class NotificationCenter {
  private backlog: CenterEntry[] = [];
  private visible = false;

  get size(): number {
    return this.backlog.length;
  }

  has(id: number): boolean {
    return this.backlog.some((entry) => entry.id === id);
  }

  get(id: number): CenterEntry | undefined {
    return this.backlog.find((entry) => entry.id === id);
  }

  /** Entries in enqueue order. */
  entries(): CenterEntry[] {
    return [...this.backlog];
  }

  /** Append a snapshot. An older entry for the same id is superseded. */
  add(entry: CenterEntry): void {
    this.backlog = this.backlog.filter((existing) => existing.id !== entry.id);
    this.backlog.push(entry);
  }

  /** Swap in a newer snapshot without moving the entry. Returns false if absent. */
  refresh(entry: CenterEntry): boolean {
    const index = this.backlog.findIndex((existing) => existing.id === entry.id);
    if (index === -1) return false;
    this.backlog[index] = entry;
    return true;
  }

  /** Remove one entry. Returns false for ids the center does not hold. */
  acknowledge(id: number): boolean {
    const before = this.backlog.length;
    this.backlog = this.backlog.filter((entry) => entry.id !== id);
    return this.backlog.length !== before;
  }

  /** Empty the backlog, returning what was removed. */
  clearAll(): CenterEntry[] {
    const removed = this.backlog;
    this.backlog = [];
    return removed;
  }

  isVisible(): boolean {
    return this.visible;
  }

  setVisible(visible: boolean): boolean {
    this.visible = visible;
    return this.visible;
  }

  toggleVisibility(): boolean {
    return this.setVisible(!this.visible);
  }
}

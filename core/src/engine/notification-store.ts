/**
 * Notification Store
 *
 * Canonical id → record mapping. The store owns every record; everything
 * else gets frozen copies and refers to records by id.
 *
 * Ids are minted monotonically and skip ids that are still live, wrapping
 * from 2^32−1 back to 1. 0 is never handed out.
 */

import { MAX_NOTIFICATION_ID } from "../notifications/constants.js";
import type {
  NotificationRecord,
  NotificationState,
  NotificationView,
} from "../notifications/types.js";
import { InvalidTransitionError } from "./errors.js";

/** Everything a caller supplies; the store fills in identity, state and timestamps. */
export type NotificationFields = Omit<NotificationRecord, "id" | "state" | "createdAt" | "updatedAt">;

const ALLOWED_TRANSITIONS: Record<NotificationState, readonly NotificationState[]> = {
  queued: ["visible", "archived"],
  visible: ["expired", "dismissed", "action-taken", "closed"],
  archived: ["visible", "closed"],
  expired: ["closed"],
  dismissed: ["closed"],
  "action-taken": ["closed"],
  closed: [],
};

/** States a record may be deleted from. */
const REMOVABLE_STATES: readonly NotificationState[] = ["closed", "archived"];

export interface NotificationStoreOptions {
  /** Clock used for createdAt/updatedAt */
  now?: () => number;
  /** First id to try (tests use this to exercise wraparound) */
  firstId?: number;
}

function toView(record: NotificationRecord): NotificationView {
  return Object.freeze({
    ...record,
    actions: record.actions.map((action) => ({ ...action })),
    hints: { ...record.hints },
    details: { ...record.details },
  });
}

export class NotificationStore {
  private records = new Map<number, NotificationRecord>();
  private nextId: number;
  private now: () => number;

  constructor(options: NotificationStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.nextId = options.firstId ?? 1;
  }

  get size(): number {
    return this.records.size;
  }

  get(id: number): NotificationView | undefined {
    const record = this.records.get(id);
    return record ? toView(record) : undefined;
  }

  /** Insert a new record in the `queued` state. */
  create(fields: NotificationFields): NotificationView {
    const id = this.allocateId();
    const timestamp = this.now();
    const record: NotificationRecord = {
      ...fields,
      id,
      state: "queued",
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.records.set(id, record);
    return toView(record);
  }

  /**
   * Update a live record in place, keeping its id, state and creation time.
   * Returns null when the id is not live.
   */
  replace(id: number, fields: NotificationFields): NotificationView | null {
    const existing = this.records.get(id);
    if (!existing) return null;

    const record: NotificationRecord = {
      ...fields,
      id,
      state: existing.state,
      createdAt: existing.createdAt,
      updatedAt: this.now(),
    };
    this.records.set(id, record);
    return toView(record);
  }

  transition(id: number, to: NotificationState): NotificationView {
    const record = this.records.get(id);
    if (!record) {
      throw new InvalidTransitionError(id, "missing", to);
    }
    if (!ALLOWED_TRANSITIONS[record.state].includes(to)) {
      throw new InvalidTransitionError(id, record.state, to);
    }
    record.state = to;
    return toView(record);
  }

  /** Delete a closed record, or an archived one cleared from the center. */
  remove(id: number): NotificationView {
    const record = this.records.get(id);
    if (!record) {
      throw new InvalidTransitionError(id, "missing", "removed");
    }
    if (!REMOVABLE_STATES.includes(record.state)) {
      throw new InvalidTransitionError(id, record.state, "removed");
    }
    this.records.delete(id);
    return toView(record);
  }

  private allocateId(): number {
    let candidate = this.nextId;
    // size + 1 distinct candidates always contain a free id
    for (let attempt = 0; attempt <= this.records.size; attempt++) {
      if (candidate < 1 || candidate > MAX_NOTIFICATION_ID) {
        candidate = 1;
      }
      if (!this.records.has(candidate)) {
        this.nextId = candidate + 1;
        return candidate;
      }
      candidate++;
    }
    throw new Error("notification id space exhausted");
  }
}

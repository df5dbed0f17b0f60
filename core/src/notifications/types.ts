/**
 * Shared notification types for xnotid.
 *
 * Used by the engine, the daemon adapters and the CLI — the single source of truth.
 */

import type { NotificationCard } from "../cards/types.js";

export type Urgency = "low" | "normal" | "critical";

/** Why a notification left the store. Wire codes live in CLOSE_REASON_CODES. */
export type CloseReason = "expired" | "dismissed" | "closed" | "undefined";

export type NotificationState =
  | "queued"
  | "visible"
  | "archived"
  | "expired"
  | "dismissed"
  | "action-taken"
  | "closed";

export interface NotificationAction {
  key: string;
  label: string;
}

/** Hint values after transport decoding (D-Bus variants already unwrapped). */
export type HintBag = Record<string, unknown>;

export type NotificationImage =
  | {
      kind: "raw";
      width: number;
      height: number;
      rowstride: number;
      hasAlpha: boolean;
      bitsPerSample: number;
      channels: number;
      /** Pixel data, base64 encoded so it survives JSON transport */
      data: string;
    }
  | { kind: "path"; path: string }
  | { kind: "name"; name: string }
  | { kind: "none" };

/** An inbound create-or-replace request, already decoded from the wire. */
export interface NotificationRequest {
  appName: string;
  /** 0 means "mint a new id" */
  replacesId: number;
  icon: string;
  summary: string;
  body: string;
  actions: NotificationAction[];
  hints: HintBag;
  /** 0 = urgency default, negative = never, positive = milliseconds */
  expireTimeout: number;
}

/** Display-relevant fields extracted from the hint bag. */
export interface NotificationDetails {
  urgency: Urgency;
  category: string | null;
  desktopEntry: string | null;
  /** Transient notifications never enter the notification center */
  transient: boolean;
  resident: boolean;
  /** 0–100 from the `value` hint */
  progress: number | null;
  group: string | null;
  cssClass: string | null;
  image: NotificationImage;
  /** From the `x-acknowledge` hint; cards force it on */
  acknowledge: boolean;
}

export interface NotificationRecord {
  id: number;
  appName: string;
  summary: string;
  body: string;
  icon: string;
  actions: NotificationAction[];
  hints: HintBag;
  expireTimeout: number;
  details: NotificationDetails;
  card: NotificationCard | null;
  /** Any defined user action also closes the notification */
  acknowledgeToDismiss: boolean;
  state: NotificationState;
  createdAt: number;
  updatedAt: number;
}

/** Read-only copy handed to anything outside the store. */
export type NotificationView = Readonly<NotificationRecord>;

export type CenterEntryOrigin = "archived" | "expired";

export interface CenterEntry {
  readonly id: number;
  readonly appName: string;
  readonly summary: string;
  readonly body: string;
  readonly icon: string;
  readonly urgency: Urgency;
  readonly image: NotificationImage;
  readonly card: NotificationCard | null;
  readonly actions: readonly NotificationAction[];
  readonly group: string | null;
  readonly origin: CenterEntryOrigin;
  readonly createdAt: number;
  readonly enqueuedAt: number;
}

/** One-way instructions for whatever draws popups and the center. */
export type RenderIntent =
  | { type: "show_popup"; notification: NotificationView; slot: number }
  | { type: "update_popup"; notification: NotificationView; slot: number }
  | { type: "remove_popup"; id: number; slot: number }
  | { type: "show_center"; entries: CenterEntry[] }
  | { type: "hide_center" };

export interface ServerInformation {
  name: string;
  vendor: string;
  version: string;
  specVersion: string;
}

/**
 * Notification constants for xnotid.
 *
 * Shared between the engine, the D-Bus adapter and the CLI.
 */

import type { CloseReason, Urgency } from "./types.js";

/** `NotificationClosed` reason codes from the freedesktop notification protocol */
export const CLOSE_REASON_CODES: Record<CloseReason, number> = {
  expired: 1,
  dismissed: 2,
  closed: 3,
  undefined: 4,
};

/** Byte values of the `urgency` hint */
export const URGENCY_BY_LEVEL: Record<number, Urgency> = {
  0: "low",
  1: "normal",
  2: "critical",
};

export const URGENCY_LEVELS: Record<Urgency, number> = {
  low: 0,
  normal: 1,
  critical: 2,
};

export const SERVER_CAPABILITIES: readonly string[] = [
  "body",
  "body-markup",
  "body-images",
  "actions",
  "persistence",
  "icon-static",
];

export const SERVER_NAME = "xnotid";
export const SERVER_VENDOR = "xnotid";
export const PROTOCOL_SPEC_VERSION = "1.2";

/** Notification ids are D-Bus `u` values */
export const MAX_NOTIFICATION_ID = 0xffff_ffff;

/** Action key emitted when a permission card's allow button is pressed */
export const PERMISSION_ALLOW_KEY = "allow";

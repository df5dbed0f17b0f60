/**
 * Hint and action decoding.
 *
 * Turns the loosely-typed hint bag and flat action list of a Notify call
 * into the typed fields the engine and renderers work with.
 */

import { URGENCY_BY_LEVEL } from "./constants.js";
import type {
  HintBag,
  NotificationAction,
  NotificationDetails,
  NotificationImage,
  Urgency,
} from "./types.js";

const RAW_IMAGE_HINTS = ["image-data", "image_data", "icon_data"] as const;
const IMAGE_PATH_HINTS = ["image-path", "image_path"] as const;

/**
 * Pair a flat `[key, label, key, label, ...]` list. A trailing key without a
 * label is dropped.
 */
export function pairActions(flat: readonly string[]): NotificationAction[] {
  const actions: NotificationAction[] = [];
  for (let i = 0; i + 1 < flat.length; i += 2) {
    actions.push({ key: flat[i], label: flat[i + 1] });
  }
  return actions;
}

export function hintString(hints: HintBag, key: string): string | null {
  const value = hints[key];
  return typeof value === "string" ? value : null;
}

export function hintBoolean(hints: HintBag, key: string): boolean | null {
  const value = hints[key];
  return typeof value === "boolean" ? value : null;
}

export function hintInteger(hints: HintBag, key: string): number | null {
  const value = hints[key];
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "bigint") return Number(value);
  return null;
}

/** Unknown or missing urgency bytes fall back to normal. */
export function parseUrgency(hints: HintBag): Urgency {
  const level = hintInteger(hints, "urgency");
  if (level === null) return "normal";
  return URGENCY_BY_LEVEL[level] ?? "normal";
}

function toBase64(data: unknown): string | null {
  if (data instanceof Uint8Array) {
    return Buffer.from(data).toString("base64");
  }
  if (Array.isArray(data) && data.every((b) => typeof b === "number")) {
    return Buffer.from(data).toString("base64");
  }
  return null;
}

/** Decode an `(iiibiiay)` image tuple. */
function parseRawImage(value: unknown): NotificationImage | null {
  if (!Array.isArray(value) || value.length !== 7) return null;
  const [width, height, rowstride, hasAlpha, bitsPerSample, channels, pixels] = value;
  if (
    typeof width !== "number" ||
    typeof height !== "number" ||
    typeof rowstride !== "number" ||
    typeof hasAlpha !== "boolean" ||
    typeof bitsPerSample !== "number" ||
    typeof channels !== "number"
  ) {
    return null;
  }
  const data = toBase64(pixels);
  if (data === null) return null;
  return { kind: "raw", width, height, rowstride, hasAlpha, bitsPerSample, channels, data };
}

function imageFromReference(ref: string): NotificationImage {
  if (ref.startsWith("/") || ref.startsWith("file://")) {
    return { kind: "path", path: ref };
  }
  return { kind: "name", name: ref };
}

/**
 * Resolve the image to show: raw pixel hints first, then path hints, then
 * the icon argument of the call.
 */
export function resolveImage(hints: HintBag, icon: string): NotificationImage {
  for (const key of RAW_IMAGE_HINTS) {
    const raw = parseRawImage(hints[key]);
    if (raw) return raw;
  }

  for (const key of IMAGE_PATH_HINTS) {
    const path = hintString(hints, key);
    if (path) return imageFromReference(path);
  }

  if (icon) return imageFromReference(icon);

  return { kind: "none" };
}

export function parseNotificationDetails(hints: HintBag, icon: string): NotificationDetails {
  const progress = hintInteger(hints, "value");

  return {
    urgency: parseUrgency(hints),
    category: hintString(hints, "category"),
    desktopEntry: hintString(hints, "desktop-entry"),
    transient: hintBoolean(hints, "transient") ?? false,
    resident: hintBoolean(hints, "resident") ?? false,
    progress: progress === null ? null : Math.min(100, Math.max(0, progress)),
    group: hintString(hints, "x-group"),
    cssClass: hintString(hints, "x-css-class"),
    image: resolveImage(hints, icon),
    acknowledge: hintBoolean(hints, "x-acknowledge") ?? false,
  };
}

/**
 * Send command — posts a notification through the standard Notify call.
 * Works against any notification daemon, not only xnotid.
 */

import { InvalidArgumentError } from "commander";
import * as dbus from "dbus-next";
import { URGENCY_LEVELS } from "@xnotid/core";
import type { Urgency } from "@xnotid/core";
import { NOTIFICATIONS_BUS_NAME, NOTIFICATIONS_INTERFACE, NOTIFICATIONS_OBJECT_PATH } from "@xnotid/server";
import { withSessionBus } from "./bus-client.js";

export interface SendOptions {
  app: string;
  urgency?: Urgency;
  /** Milliseconds; -1 leaves it to the daemon, 0 never expires */
  timeout: number;
  icon: string;
  /** Flat key/label list */
  action: string[];
  replace: number;
  category?: string;
  transient?: boolean;
}

const NOTIFY_SIGNATURE = "susssasa{sv}i";

export function parseUrgency(value: string): Urgency {
  if (value === "low" || value === "normal" || value === "critical") return value;
  throw new InvalidArgumentError("Must be low, normal or critical.");
}

/** Parses `key:label` (or a bare key) and appends it to the flat list. */
export function parseActionOption(value: string, previous: string[] = []): string[] {
  const separator = value.indexOf(":");
  const key = separator === -1 ? value : value.slice(0, separator);
  const label = separator === -1 ? value : value.slice(separator + 1);
  if (key.length === 0) {
    throw new InvalidArgumentError("Action key must not be empty.");
  }
  return [...previous, key, label];
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function buildHints(options: SendOptions): Record<string, dbus.Variant> {
  const hints: Record<string, dbus.Variant> = {};
  if (options.urgency) hints.urgency = new dbus.Variant("y", URGENCY_LEVELS[options.urgency]);
  if (options.category) hints.category = new dbus.Variant("s", options.category);
  if (options.transient) hints.transient = new dbus.Variant("b", true);
  return hints;
}

export function buildNotifyBody(summary: string, body: string, options: SendOptions): unknown[] {
  return [
    options.app,
    options.replace,
    options.icon,
    summary,
    body,
    options.action,
    buildHints(options),
    options.timeout,
  ];
}

export async function sendNotification(
  summary: string,
  body: string | undefined,
  options: SendOptions,
): Promise<void> {
  await withSessionBus(async (call) => {
    const [id] = await call({
      destination: NOTIFICATIONS_BUS_NAME,
      path: NOTIFICATIONS_OBJECT_PATH,
      iface: NOTIFICATIONS_INTERFACE,
      member: "Notify",
      signature: NOTIFY_SIGNATURE,
      body: buildNotifyBody(summary, body ?? "", options),
    });
    console.log(String(id));
  });
}

/**
 * Toggle-center command — shows or hides the notification center of the
 * running daemon.
 */

import { CONTROL_BUS_NAME, CONTROL_INTERFACE, CONTROL_OBJECT_PATH } from "@xnotid/server";
import { withSessionBus, type CallMethod } from "./bus-client.js";

export async function requestToggleCenter(call: CallMethod): Promise<void> {
  await call({
    destination: CONTROL_BUS_NAME,
    path: CONTROL_OBJECT_PATH,
    iface: CONTROL_INTERFACE,
    member: "ToggleCenter",
  });
}

export async function toggleCenter(): Promise<void> {
  await withSessionBus(requestToggleCenter);
}

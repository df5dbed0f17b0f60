/**
 * Clear command — empties the notification center.
 */

import { withBridgeClient, type BridgeSession } from "./client-helper.js";

export function requestClearCenter({ hello, send }: Pick<BridgeSession, "hello" | "send">): string {
  send({ type: "clear_center" });
  return `Cleared ${hello.center.length} center entries`;
}

export async function clearCenter(options: { config?: string }): Promise<void> {
  await withBridgeClient(
    (session) => {
      console.log(requestClearCenter(session));
    },
    { configPath: options.config },
  );
}

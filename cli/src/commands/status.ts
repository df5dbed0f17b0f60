/**
 * Status command — one-shot display of popups, the center backlog and
 * do-not-disturb.
 */

import { withBridgeClient } from "./client-helper.js";
import type { HelloMessage } from "@xnotid/server";

export function formatStatus(hello: HelloMessage): string[] {
  const lines: string[] = [];
  lines.push(`Do not disturb: ${hello.doNotDisturb ? "on" : "off"}`);
  lines.push(`Center: ${hello.centerVisible ? "shown" : "hidden"}, ${hello.center.length} entries`);

  if (hello.popups.length === 0) {
    lines.push("No popups on screen");
  } else {
    lines.push(`Popups: ${hello.popups.length}`);
    for (const { slot, notification } of hello.popups) {
      const app = notification.appName || "unknown";
      lines.push(`  [${slot}] #${notification.id} ${app}: ${notification.summary}`);
    }
  }
  return lines;
}

export async function showStatus(options: { config?: string; json?: boolean }): Promise<void> {
  await withBridgeClient(
    ({ hello }) => {
      if (options.json) {
        console.log(
          JSON.stringify(
            {
              doNotDisturb: hello.doNotDisturb,
              centerVisible: hello.centerVisible,
              popups: hello.popups,
              center: hello.center,
            },
            null,
            2,
          ),
        );
        return;
      }
      for (const line of formatStatus(hello)) {
        console.log(line);
      }
    },
    { configPath: options.config },
  );
}

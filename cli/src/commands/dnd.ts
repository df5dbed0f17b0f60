/**
 * DND command — toggles do-not-disturb on the running daemon.
 */

import { withBridgeClient, type BridgeSession } from "./client-helper.js";

interface DndChanged {
  type: "dnd_changed";
  enabled: boolean;
}

interface BridgeError {
  type: "error";
  message: string;
}

export function isDndReply(message: unknown): message is DndChanged | BridgeError {
  if (typeof message !== "object" || message === null || !("type" in message)) return false;
  if (message.type === "dnd_changed") return "enabled" in message && typeof message.enabled === "boolean";
  if (message.type === "error") return "message" in message && typeof message.message === "string";
  return false;
}

/** Ask for a toggle and describe the outcome. Throws the daemon's refusal. */
export async function requestDndToggle(session: Pick<BridgeSession, "send" | "waitFor">): Promise<string> {
  const reply = session.waitFor(isDndReply);
  session.send({ type: "toggle_dnd" });
  const result = await reply;
  if (result.type === "error") {
    throw new Error(result.message);
  }
  return `Do not disturb ${result.enabled ? "on" : "off"}`;
}

export async function toggleDoNotDisturb(options: { config?: string }): Promise<void> {
  await withBridgeClient(
    async (session) => {
      console.log(await requestDndToggle(session));
    },
    { configPath: options.config },
  );
}

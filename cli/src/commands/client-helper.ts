/**
 * Shared helper for CLI commands that need a temporary renderer bridge
 * connection to the running daemon.
 */

import WebSocket from "ws";
import { getErrorMessage } from "@xnotid/core";
import { loadDaemonConfig } from "@xnotid/server";
import type { HelloMessage, RendererMessage } from "@xnotid/server";

export interface BridgeSession {
  hello: HelloMessage;
  send: (message: RendererMessage) => void;
  /** Resolves with the next message the guard accepts */
  waitFor: <T>(guard: (message: unknown) => message is T) => Promise<T>;
}

export function isHelloMessage(value: unknown): value is HelloMessage {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || value.type !== "hello") return false;
  return (
    "popups" in value &&
    Array.isArray(value.popups) &&
    "center" in value &&
    Array.isArray(value.center) &&
    "doNotDisturb" in value &&
    typeof value.doNotDisturb === "boolean"
  );
}

export function bridgeUrl(configPath?: string): string {
  const { config } = loadDaemonConfig({ path: configPath });
  return process.env.XNOTID_BRIDGE_URL || `ws://${config.bridge.host}:${config.bridge.port}`;
}

/**
 * Connect to the renderer bridge, wait for the hello message, and run the
 * action. Handles the timeout and closes the connection afterwards.
 */
export async function withBridgeClient(
  action: (session: BridgeSession) => void | Promise<void>,
  options: { configPath?: string; timeoutMs?: number } = {},
): Promise<void> {
  const { timeoutMs = 3000 } = options;
  const url = bridgeUrl(options.configPath);

  return new Promise((resolve) => {
    const ws = new WebSocket(url);
    const waiters = new Set<(message: unknown) => boolean>();
    let settled = false;

    const finish = (error?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      if (error) {
        console.log(`Could not talk to xnotid at ${url}: ${error}`);
        console.log("Make sure the daemon is running: xnotid start");
        process.exitCode = 1;
      }
      ws.close();
      resolve();
    };

    const timeout = setTimeout(() => finish("timed out"), timeoutMs);

    const session = (hello: HelloMessage): BridgeSession => ({
      hello,
      send: (message) => ws.send(JSON.stringify(message)),
      waitFor: <T>(guard: (message: unknown) => message is T) =>
        new Promise<T>((resolveMessage) => {
          const waiter = (message: unknown): boolean => {
            if (!guard(message)) return false;
            resolveMessage(message);
            return true;
          };
          waiters.add(waiter);
        }),
    });

    ws.on("message", (data) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch (err) {
        finish(`unreadable message: ${getErrorMessage(err)}`);
        return;
      }

      if (isHelloMessage(message)) {
        Promise.resolve(action(session(message))).then(
          () => finish(),
          (err: unknown) => finish(getErrorMessage(err)),
        );
        return;
      }

      for (const waiter of waiters) {
        if (waiter(message)) waiters.delete(waiter);
      }
    });

    ws.on("error", (err) => finish(err.message));
  });
}

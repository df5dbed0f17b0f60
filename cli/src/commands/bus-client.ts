/**
 * Shared helper for CLI commands that call the running daemon over the
 * session bus.
 */

import * as dbus from "dbus-next";
import { getErrorMessage } from "@xnotid/core";

export interface MethodCall {
  destination: string;
  path: string;
  iface: string;
  member: string;
  signature?: string;
  body?: unknown[];
}

/** Calls one method on the bus. Resolves with the reply body. */
export type CallMethod = (call: MethodCall) => Promise<unknown[]>;

/** The slice of a dbus-next MessageBus the CLI uses. */
export interface SessionBus {
  call(message: dbus.Message): Promise<dbus.Message | null>;
  disconnect(): void;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface SessionBusOptions {
  timeoutMs?: number;
  /** Defaults to a fresh session bus connection */
  connect?: () => SessionBus;
}

class SessionBusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionBusError";
  }
}

/**
 * Connect to the session bus, run the action and disconnect.
 * Reports a missing bus or daemon instead of throwing and sets a failing
 * exit code.
 */
export async function withSessionBus(
  action: (call: CallMethod) => Promise<void>,
  options: SessionBusOptions = {},
): Promise<void> {
  const { timeoutMs = 3000, connect = dbus.sessionBus } = options;

  let bus: SessionBus;
  try {
    bus = connect();
  } catch (err) {
    console.error(`Could not connect to the session bus: ${getErrorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const busFailed = new Promise<never>((_, reject) => {
    bus.on("error", (err: Error) => reject(new SessionBusError(err.message)));
  });

  const call: CallMethod = async ({ destination, path, iface, member, signature, body }) => {
    const message = new dbus.Message({
      destination,
      path,
      interface: iface,
      member,
      signature,
      body: body ?? [],
    });
    const reply = await bus.call(message);
    return reply ? reply.body : [];
  };

  let timeout: NodeJS.Timeout | undefined;
  const timedOut = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => reject(new Error(`no reply within ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    await Promise.race([action(call), busFailed, timedOut]);
  } catch (err) {
    if (err instanceof SessionBusError) {
      console.error(`Could not connect to the session bus: ${err.message}`);
    } else {
      console.error(`Could not reach xnotid: ${getErrorMessage(err)}`);
      console.error("Make sure the daemon is running: xnotid start");
    }
    process.exitCode = 1;
  } finally {
    clearTimeout(timeout);
    bus.disconnect();
  }
}

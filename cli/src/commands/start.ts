/**
 * Start command — runs the daemon in the foreground until interrupted.
 */

import { BusConnectionError, BusNameError, startDaemon } from "@xnotid/server";
import type { Daemon } from "@xnotid/server";
import { getErrorMessage } from "@xnotid/core";

export interface StartOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export async function runDaemon(options: StartOptions): Promise<void> {
  let daemon: Daemon;
  try {
    daemon = await startDaemon({
      configPath: options.config,
      verbose: options.verbose,
      silent: options.quiet,
    });
  } catch (err) {
    if (err instanceof BusNameError || err instanceof BusConnectionError) {
      console.error(`xnotid: ${err.message}`);
    } else {
      console.error(`xnotid: failed to start: ${getErrorMessage(err)}`);
    }
    process.exitCode = 1;
    return;
  }

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    console.log(`\nReceived ${signal}, shutting down...`);
    daemon.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`xnotid: error while stopping: ${getErrorMessage(err)}`);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/**
 * Daemon bootstrap
 *
 * Wires one engine to its adapters: the D-Bus protocol server, the
 * renderer bridge and the journal. Used by `xnotid start` and embeddable
 * from other programs.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { NotificationEngine, createLogger, getErrorMessage } from '@xnotid/core';
import type { DaemonConfig, Logger } from '@xnotid/core';
import { loadDaemonConfig } from './config/daemon-config.js';
import { NotificationProtocol } from './protocol/notification-protocol.js';
import { DbusServer, type BusConnection } from './protocol/dbus-server.js';
import { RendererBridge } from './renderer/renderer-bridge.js';
import { NotificationJournal } from './journal/notification-journal.js';

export interface DaemonOptions {
  /** Use this config instead of loading one */
  config?: DaemonConfig;
  /** Config file to load (default: resolved from the environment) */
  configPath?: string;
  /** Suppress console output */
  silent?: boolean;
  /** Log debug lines */
  verbose?: boolean;
  /** Bus connection (default: the session bus) */
  bus?: BusConnection;
}

export interface Daemon {
  /** Stop serving and release the bus names */
  stop: () => Promise<void>;
  getEngine: () => NotificationEngine;
  getConfig: () => DaemonConfig;
  /** Port the renderer bridge is bound to */
  bridgePort: number;
}

/** Version from the server package manifest. */
export function readDaemonVersion(logger?: Logger): string {
  const manifestPath = join(__dirname, '..', 'package.json');
  try {
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
      const { version } = manifest;
      if (typeof version === 'string') return version;
    }
  } catch (err) {
    logger?.warn(`[Daemon] Could not read ${manifestPath}: ${getErrorMessage(err)}`);
  }
  return '0.0.0';
}

/**
 * Start the notification daemon.
 * Rejects with BusNameError when another daemon owns the bus names.
 */
export async function startDaemon(options: DaemonOptions = {}): Promise<Daemon> {
  const { silent = false, verbose = false } = options;
  const logger = createLogger({ silent, verbose });

  const config = options.config ?? loadDaemonConfig({ path: options.configPath, logger }).config;

  const engine = new NotificationEngine({
    config: {
      maxVisible: config.maxVisible,
      timeouts: config.timeouts,
      hoverPause: config.hoverPause,
      dndEnabled: config.dndEnabled,
    },
    logger,
  });
  engine.start();

  const detachJournal = config.journal.enabled
    ? new NotificationJournal({ path: config.journal.path, logger }).attach(engine)
    : null;

  const protocol = new NotificationProtocol({
    engine,
    version: readDaemonVersion(logger),
    logger,
  });

  const bridge = new RendererBridge({
    engine,
    display: {
      monitor: config.monitor,
      corner: config.corner,
      popupWidth: config.popupWidth,
      clickToDismiss: config.clickToDismiss,
      closeButtonOnHover: config.closeButtonOnHover,
    },
    host: config.bridge.host,
    port: config.bridge.port,
    logger,
  });

  const dbusServer = new DbusServer({ protocol, bus: options.bus, logger });

  const teardown = async (): Promise<void> => {
    dbusServer.stop();
    await bridge.stop();
    detachJournal?.();
    engine.shutdown();
  };

  let bridgePort: number;
  try {
    bridgePort = await bridge.start();
    await dbusServer.start();
  } catch (err) {
    await teardown().catch((stopErr: unknown) => {
      logger.warn(`[Daemon] Cleanup after failed start: ${getErrorMessage(stopErr)}`);
    });
    throw err;
  }

  logger.log(`[Daemon] Ready (max ${config.maxVisible} popups, renderer bridge on port ${bridgePort})`);

  return {
    stop: async () => {
      await teardown();
      logger.log('[Daemon] Stopped');
    },
    getEngine: () => engine,
    getConfig: () => config,
    bridgePort,
  };
}

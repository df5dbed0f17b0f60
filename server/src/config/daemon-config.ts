/**
 * Daemon configuration loading
 *
 * Reads the JSON config once at startup. Every field is validated on its
 * own; a bad value is logged and replaced by its default, so one typo never
 * takes the whole file down. The result is frozen.
 */

import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  DEFAULT_DAEMON_CONFIG,
  POPUP_CORNERS,
  createLogger,
  getErrorMessage,
  isNotFoundError,
  isPermissionError,
} from '@xnotid/core';
import type { DaemonConfig, Logger, PopupCorner } from '@xnotid/core';

type JsonObject = Record<string, unknown>;
type Guard<T> = (value: unknown) => value is T;

export interface LoadedConfig {
  config: DaemonConfig;
  /** File the config was read from (it may not exist) */
  path: string;
  /** Whether the file existed and parsed */
  fromFile: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file, overriding the environment */
  path?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
  logger?: Logger;
}

/**
 * `$XNOTID_CONFIG`, else `$XDG_CONFIG_HOME/xnotid/config.json`,
 * else `~/.config/xnotid/config.json`.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, home = homedir()): string {
  if (env.XNOTID_CONFIG) return env.XNOTID_CONFIG;
  const configHome = env.XDG_CONFIG_HOME || join(home, '.config');
  return join(configHome, 'xnotid', 'config.json');
}

export function defaultJournalPath(home = homedir()): string {
  return join(home, '.local', 'share', 'xnotid', 'notifications.jsonl');
}

export function getDefaultConfig(home = homedir()): DaemonConfig {
  return {
    ...DEFAULT_DAEMON_CONFIG,
    timeouts: { ...DEFAULT_DAEMON_CONFIG.timeouts },
    journal: { enabled: DEFAULT_DAEMON_CONFIG.journal.enabled, path: defaultJournalPath(home) },
    bridge: { ...DEFAULT_DAEMON_CONFIG.bridge },
  };
}

// ============================================================
// Field validation
// ============================================================

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

const isNonNegativeInt = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

const isPositiveInt = (value: unknown): value is number =>
  isNonNegativeInt(value) && value > 0;

const isPort = (value: unknown): value is number =>
  isNonNegativeInt(value) && value <= 65535;

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

const isCorner = (value: unknown): value is PopupCorner =>
  typeof value === 'string' && POPUP_CORNERS.some((corner) => corner === value);

function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

class FieldReader {
  constructor(private logger: Logger) {}

  pick<T>(source: JsonObject, key: string, field: string, guard: Guard<T>, fallback: T): T {
    if (!(key in source) || source[key] === undefined) return fallback;

    const value = source[key];
    if (guard(value)) return value;

    this.logger.warn(
      `[Config] Invalid value for "${field}": ${JSON.stringify(value)}, using ${JSON.stringify(fallback)}`,
    );
    return fallback;
  }

  section(source: JsonObject, key: string): JsonObject {
    const value = source[key];
    if (value === undefined) return {};
    if (isObject(value)) return value;

    this.logger.warn(`[Config] "${key}" must be an object, using defaults`);
    return {};
  }
}

/**
 * Build a frozen config from parsed JSON, falling back field by field.
 */
export function parseDaemonConfig(raw: unknown, logger: Logger, home = homedir()): DaemonConfig {
  const defaults = getDefaultConfig(home);

  if (!isObject(raw)) {
    logger.warn('[Config] Config file must contain a JSON object, using defaults');
    return freezeConfig(defaults);
  }

  const reader = new FieldReader(logger);
  const timeouts = reader.section(raw, 'timeouts');
  const journal = reader.section(raw, 'journal');
  const bridge = reader.section(raw, 'bridge');

  const journalPath = reader.pick(journal, 'path', 'journal.path', isNonEmptyString, defaults.journal.path);

  return freezeConfig({
    monitor: reader.pick(raw, 'monitor', 'monitor', isNonNegativeInt, defaults.monitor),
    corner: reader.pick(raw, 'corner', 'corner', isCorner, defaults.corner),
    popupWidth: reader.pick(raw, 'popupWidth', 'popupWidth', isPositiveInt, defaults.popupWidth),
    maxVisible: reader.pick(raw, 'maxVisible', 'maxVisible', isPositiveInt, defaults.maxVisible),
    timeouts: {
      low: reader.pick(timeouts, 'low', 'timeouts.low', isNonNegativeInt, defaults.timeouts.low),
      normal: reader.pick(timeouts, 'normal', 'timeouts.normal', isNonNegativeInt, defaults.timeouts.normal),
      critical: reader.pick(timeouts, 'critical', 'timeouts.critical', isNonNegativeInt, defaults.timeouts.critical),
    },
    hoverPause: reader.pick(raw, 'hoverPause', 'hoverPause', isBoolean, defaults.hoverPause),
    clickToDismiss: reader.pick(raw, 'clickToDismiss', 'clickToDismiss', isBoolean, defaults.clickToDismiss),
    closeButtonOnHover: reader.pick(raw, 'closeButtonOnHover', 'closeButtonOnHover', isBoolean, defaults.closeButtonOnHover),
    dndEnabled: reader.pick(raw, 'dndEnabled', 'dndEnabled', isBoolean, defaults.dndEnabled),
    journal: {
      enabled: reader.pick(journal, 'enabled', 'journal.enabled', isBoolean, defaults.journal.enabled),
      path: expandHome(journalPath, home),
    },
    bridge: {
      host: reader.pick(bridge, 'host', 'bridge.host', isNonEmptyString, defaults.bridge.host),
      port: reader.pick(bridge, 'port', 'bridge.port', isPort, defaults.bridge.port),
    },
  });
}

function freezeConfig(config: DaemonConfig): DaemonConfig {
  Object.freeze(config.timeouts);
  Object.freeze(config.journal);
  Object.freeze(config.bridge);
  return Object.freeze(config);
}

/**
 * Load the daemon config. A missing file means defaults; an unreadable or
 * invalid one is logged and also means defaults.
 */
export function loadDaemonConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const logger = options.logger ?? createLogger({ silent: true });
  const home = options.home ?? homedir();
  const path = options.path ?? resolveConfigPath(options.env ?? process.env, home);

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      logger.debug(`[Config] No config at ${path}, using defaults`);
    } else if (isPermissionError(err)) {
      logger.warn(`[Config] No permission to read ${path}, using defaults`);
    } else {
      logger.warn(`[Config] Could not read ${path}: ${getErrorMessage(err)}`);
    }
    return { config: freezeConfig(getDefaultConfig(home)), path, fromFile: false };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    logger.warn(`[Config] ${path} is not valid JSON (${getErrorMessage(err)}), using defaults`);
    return { config: freezeConfig(getDefaultConfig(home)), path, fromFile: false };
  }

  logger.log(`[Config] Loaded ${path}`);
  return { config: parseDaemonConfig(raw, logger, home), path, fromFile: true };
}

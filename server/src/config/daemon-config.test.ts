/**
 * Daemon config loading tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadDaemonConfig,
  parseDaemonConfig,
  resolveConfigPath,
  getDefaultConfig,
} from './daemon-config.js';

const HOME = '/home/tester';

function mockLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

describe('resolveConfigPath', () => {
  it('prefers XNOTID_CONFIG', () => {
    expect(resolveConfigPath({ XNOTID_CONFIG: '/etc/xnotid.json', XDG_CONFIG_HOME: '/xdg' }, HOME)).toBe('/etc/xnotid.json');
  });

  it('uses XDG_CONFIG_HOME next', () => {
    expect(resolveConfigPath({ XDG_CONFIG_HOME: '/xdg' }, HOME)).toBe('/xdg/xnotid/config.json');
  });

  it('falls back to ~/.config', () => {
    expect(resolveConfigPath({}, HOME)).toBe('/home/tester/.config/xnotid/config.json');
  });
});

describe('parseDaemonConfig', () => {
  it('reads every field', () => {
    const logger = mockLogger();
    const config = parseDaemonConfig({
      monitor: 1,
      corner: 'bottom-left',
      popupWidth: 320,
      maxVisible: 5,
      timeouts: { low: 2000, normal: 4000, critical: 8000 },
      hoverPause: false,
      clickToDismiss: false,
      closeButtonOnHover: true,
      dndEnabled: false,
      journal: { enabled: false, path: '/var/tmp/journal.jsonl' },
      bridge: { host: '0.0.0.0', port: 5000 },
    }, logger, HOME);

    expect(config).toEqual({
      monitor: 1,
      corner: 'bottom-left',
      popupWidth: 320,
      maxVisible: 5,
      timeouts: { low: 2000, normal: 4000, critical: 8000 },
      hoverPause: false,
      clickToDismiss: false,
      closeButtonOnHover: true,
      dndEnabled: false,
      journal: { enabled: false, path: '/var/tmp/journal.jsonl' },
      bridge: { host: '0.0.0.0', port: 5000 },
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('fills missing fields from the defaults', () => {
    expect(parseDaemonConfig({}, mockLogger(), HOME)).toEqual(getDefaultConfig(HOME));
  });

  it('replaces invalid fields one at a time', () => {
    const logger = mockLogger();
    const config = parseDaemonConfig({
      maxVisible: 0,
      corner: 'middle',
      popupWidth: 250,
      timeouts: { low: -5, normal: 3000 },
    }, logger, HOME);

    expect(config.maxVisible).toBe(3);
    expect(config.corner).toBe('top-right');
    expect(config.popupWidth).toBe(250);
    expect(config.timeouts).toEqual({ low: 5000, normal: 3000, critical: 0 });
    expect(logger.warn).toHaveBeenCalledWith('[Config] Invalid value for "maxVisible": 0, using 3');
    expect(logger.warn).toHaveBeenCalledWith('[Config] Invalid value for "corner": "middle", using "top-right"');
    expect(logger.warn).toHaveBeenCalledWith('[Config] Invalid value for "timeouts.low": -5, using 5000');
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });

  it('ignores a section that is not an object', () => {
    const logger = mockLogger();
    const config = parseDaemonConfig({ bridge: 'localhost:9000' }, logger, HOME);

    expect(config.bridge).toEqual({ host: '127.0.0.1', port: 4250 });
    expect(logger.warn).toHaveBeenCalledWith('[Config] "bridge" must be an object, using defaults');
  });

  it('expands ~ in the journal path', () => {
    const config = parseDaemonConfig({ journal: { path: '~/logs/notes.jsonl' } }, mockLogger(), HOME);
    expect(config.journal.path).toBe('/home/tester/logs/notes.jsonl');
  });

  it('uses defaults for a non-object document', () => {
    const logger = mockLogger();

    expect(parseDaemonConfig([1, 2], logger, HOME)).toEqual(getDefaultConfig(HOME));
    expect(logger.warn).toHaveBeenCalledWith('[Config] Config file must contain a JSON object, using defaults');
  });

  it('freezes the result', () => {
    const config = parseDaemonConfig({}, mockLogger(), HOME);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timeouts)).toBe(true);
    expect(Object.isFrozen(config.bridge)).toBe(true);
  });
});

describe('loadDaemonConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'xnotid-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    const logger = mockLogger();
    const loaded = loadDaemonConfig({ path: join(dir, 'config.json'), home: HOME, logger });

    expect(loaded.fromFile).toBe(false);
    expect(loaded.config).toEqual(getDefaultConfig(HOME));
    expect(loaded.config.journal.path).toBe('/home/tester/.local/share/xnotid/notifications.jsonl');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('reads the file from the environment path', () => {
    const path = join(dir, 'custom.json');
    writeFileSync(path, JSON.stringify({ maxVisible: 1 }));

    const loaded = loadDaemonConfig({ env: { XNOTID_CONFIG: path }, home: HOME });

    expect(loaded.path).toBe(path);
    expect(loaded.fromFile).toBe(true);
    expect(loaded.config.maxVisible).toBe(1);
  });

  it('warns and uses defaults for broken JSON', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ "maxVisible": ');
    const logger = mockLogger();

    const loaded = loadDaemonConfig({ path, home: HOME, logger });

    expect(loaded.fromFile).toBe(false);
    expect(loaded.config.maxVisible).toBe(3);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('warns when the path cannot be read as a file', () => {
    const logger = mockLogger();

    const loaded = loadDaemonConfig({ path: dir, home: HOME, logger });

    expect(loaded.fromFile).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

/**
 * D-Bus server
 *
 * Exports the notification and control interfaces on the session bus,
 * claims both well-known names and forwards engine signals. Losing either
 * name is fatal: another notification daemon is already running.
 */

import * as dbus from 'dbus-next';
import { createLogger } from '@xnotid/core';
import type { Logger } from '@xnotid/core';
import type { NotificationProtocol } from './notification-protocol.js';
import { ControlInterface, NotificationsInterface } from './dbus-interfaces.js';

export const NOTIFICATIONS_BUS_NAME = 'org.freedesktop.Notifications';
export const NOTIFICATIONS_OBJECT_PATH = '/org/freedesktop/Notifications';
export const CONTROL_BUS_NAME = 'org.xnotid.Control';
export const CONTROL_OBJECT_PATH = '/org/xnotid/Control';

/** RequestName flag and replies from the D-Bus specification */
const NAME_FLAG_DO_NOT_QUEUE = 0x4;
const REPLY_PRIMARY_OWNER = 1;
const REPLY_ALREADY_OWNER = 4;

/** The slice of a dbus-next MessageBus the server uses. */
export interface BusConnection {
  requestName(name: string, flags: number): Promise<number>;
  export(path: string, iface: dbus.interface.Interface): void;
  disconnect(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
  removeListener(event: 'error', listener: (err: Error) => void): unknown;
}

export class BusNameError extends Error {
  constructor(readonly busName: string, readonly reply: number) {
    super(`could not own D-Bus name ${busName} (reply ${reply}); is another notification daemon running?`);
    this.name = 'BusNameError';
  }
}

export class BusConnectionError extends Error {
  constructor(cause: Error) {
    super(`could not connect to the session bus: ${cause.message}`, { cause });
    this.name = 'BusConnectionError';
  }
}

/** Rejects on the first bus error until detached. */
function rejectOnBusError(bus: BusConnection): { failed: Promise<never>; detach: () => void } {
  let detach = (): void => {};
  const failed = new Promise<never>((_, reject) => {
    const listener = (err: Error): void => reject(new BusConnectionError(err));
    bus.on('error', listener);
    detach = () => {
      bus.removeListener('error', listener);
    };
  });
  return { failed, detach };
}

export interface DbusServerOptions {
  protocol: NotificationProtocol;
  /** Defaults to a fresh session bus connection */
  bus?: BusConnection;
  logger?: Logger;
}

export class DbusServer {
  private protocol: NotificationProtocol;
  private bus: BusConnection | null;
  private logger: Logger;
  private notifications: NotificationsInterface;
  private control: ControlInterface;
  private unsubscribe: (() => void) | null = null;

  constructor(options: DbusServerOptions) {
    this.protocol = options.protocol;
    this.bus = options.bus ?? null;
    this.logger = options.logger ?? createLogger({ silent: true });
    this.notifications = new NotificationsInterface(this.protocol);
    this.control = new ControlInterface(this.protocol);
  }

  private get log() { return this.logger.log.bind(this.logger); }

  /**
   * Export both objects and claim both names. Rejects with BusNameError when
   * a name is taken and with BusConnectionError when the bus fails first.
   */
  async start(): Promise<void> {
    const bus = this.bus ?? dbus.sessionBus();
    this.bus = bus;
    bus.on('error', this.handleBusError);

    bus.export(NOTIFICATIONS_OBJECT_PATH, this.notifications);
    bus.export(CONTROL_OBJECT_PATH, this.control);

    const busError = rejectOnBusError(bus);
    try {
      await Promise.race([this.claimAll(bus), busError.failed]);
    } finally {
      busError.detach();
    }

    this.unsubscribe = this.protocol.onSignal((signal) => {
      switch (signal.type) {
        case 'notification_closed':
          this.notifications.NotificationClosed(signal.id, signal.reason);
          break;
        case 'action_invoked':
          this.notifications.ActionInvoked(signal.id, signal.actionKey);
          break;
      }
    });

    this.log(`[DBus] Serving ${NOTIFICATIONS_BUS_NAME} and ${CONTROL_BUS_NAME}`);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.bus) {
      this.bus.disconnect();
      this.bus = null;
      this.log('[DBus] Disconnected');
    }
  }

  private handleBusError = (err: Error): void => {
    this.logger.error(`[DBus] Bus connection error: ${err.message}`);
  };

  private async claimAll(bus: BusConnection): Promise<void> {
    await this.claim(bus, NOTIFICATIONS_BUS_NAME);
    await this.claim(bus, CONTROL_BUS_NAME);
  }

  private async claim(bus: BusConnection, name: string): Promise<void> {
    const reply = await bus.requestName(name, NAME_FLAG_DO_NOT_QUEUE);
    if (reply !== REPLY_PRIMARY_OWNER && reply !== REPLY_ALREADY_OWNER) {
      throw new BusNameError(name, reply);
    }
    this.logger.debug(`[DBus] Own ${name}`);
  }
}

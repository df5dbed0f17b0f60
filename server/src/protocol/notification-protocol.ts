/**
 * Notification Protocol
 *
 * Transport-independent request/response surface of the daemon: the calls
 * a notification client makes and the signals it gets back. The D-Bus
 * adapter is a thin wrapper around this.
 */

import {
  CLOSE_REASON_CODES,
  PROTOCOL_SPEC_VERSION,
  SERVER_CAPABILITIES,
  SERVER_NAME,
  SERVER_VENDOR,
  createLogger,
  pairActions,
} from '@xnotid/core';
import type {
  EngineEvent,
  HintBag,
  Logger,
  NotificationEngine,
  ServerInformation,
} from '@xnotid/core';

/** Arguments of a Notify call as they come off the wire. */
export interface NotifyCall {
  appName: string;
  replacesId: number;
  icon: string;
  summary: string;
  body: string;
  /** Flat `[key, label, key, label, ...]` list */
  actions: string[];
  hints: HintBag;
  /** Wire convention: -1 lets the server decide, 0 never expires */
  expireTimeout: number;
}

export type ProtocolSignal =
  | { type: 'notification_closed'; id: number; reason: number }
  | { type: 'action_invoked'; id: number; actionKey: string };

export type SignalListener = (signal: ProtocolSignal) => void;

export interface NotificationProtocolOptions {
  engine: NotificationEngine;
  /** Daemon version reported by GetServerInformation */
  version: string;
  logger?: Logger;
}

export class NotificationProtocol {
  private engine: NotificationEngine;
  private version: string;
  private logger: Logger;

  constructor(options: NotificationProtocolOptions) {
    this.engine = options.engine;
    this.version = options.version;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  notify(call: NotifyCall): number {
    const id = this.engine.notify({
      appName: call.appName,
      replacesId: call.replacesId,
      icon: call.icon,
      summary: call.summary,
      body: call.body,
      actions: pairActions(call.actions),
      hints: call.hints,
      expireTimeout: fromWireTimeout(call.expireTimeout),
    });
    this.logger.debug(`[Protocol] Notify from ${call.appName || 'unknown'} -> ${id}`);
    return id;
  }

  /** Unknown ids succeed silently. */
  closeNotification(id: number): void {
    this.engine.closeNotification(id);
  }

  getCapabilities(): string[] {
    return [...SERVER_CAPABILITIES];
  }

  getServerInformation(): ServerInformation {
    return {
      name: SERVER_NAME,
      vendor: SERVER_VENDOR,
      version: this.version,
      specVersion: PROTOCOL_SPEC_VERSION,
    };
  }

  toggleCenter(): void {
    const visible = this.engine.toggleCenter();
    this.logger.debug(`[Protocol] Center ${visible ? 'shown' : 'hidden'}`);
  }

  /** Subscribe to outbound signals. Returns an unsubscribe function. */
  onSignal(listener: SignalListener): () => void {
    return this.engine.subscribe((event) => {
      const signal = toSignal(event);
      if (signal) listener(signal);
    });
  }
}

/** Map a wire expire_timeout onto the engine's (0 = default, negative = never). */
export function fromWireTimeout(expireTimeout: number): number {
  if (expireTimeout === 0) return -1;
  if (expireTimeout < 0) return 0;
  return expireTimeout;
}

export function toSignal(event: EngineEvent): ProtocolSignal | null {
  switch (event.type) {
    case 'notification_closed':
      return { type: 'notification_closed', id: event.id, reason: CLOSE_REASON_CODES[event.reason] };
    case 'action_invoked':
      return { type: 'action_invoked', id: event.id, actionKey: event.actionKey };
    default:
      return null;
  }
}

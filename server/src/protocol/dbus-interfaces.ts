/**
 * D-Bus interfaces
 *
 * `org.freedesktop.Notifications` and the `org.xnotid.Control` surface,
 * declared with dbus-next's `configureMembers` so no decorator support is
 * needed. Method bodies delegate to the transport-independent protocol.
 */

import * as dbus from 'dbus-next';
import type { HintBag } from '@xnotid/core';
import type { NotificationProtocol } from './notification-protocol.js';

export const NOTIFICATIONS_INTERFACE = 'org.freedesktop.Notifications';
export const CONTROL_INTERFACE = 'org.xnotid.Control';

/**
 * Strip the variant wrappers off an `a{sv}` hint dictionary. Nested
 * variants (a variant holding a variant) are unwrapped all the way.
 */
export function unwrapHints(hints: Record<string, unknown>): HintBag {
  const plain: HintBag = {};
  for (const [key, value] of Object.entries(hints)) {
    plain[key] = unwrapVariant(value);
  }
  return plain;
}

function unwrapVariant(value: unknown): unknown {
  let current = value;
  while (current instanceof dbus.Variant) {
    const inner: unknown = current.value;
    current = inner;
  }
  return current;
}

export class NotificationsInterface extends dbus.interface.Interface {
  constructor(private protocol: NotificationProtocol) {
    super(NOTIFICATIONS_INTERFACE);
  }

  Notify(
    appName: string,
    replacesId: number,
    appIcon: string,
    summary: string,
    body: string,
    actions: string[],
    hints: Record<string, unknown>,
    expireTimeout: number,
  ): number {
    return this.protocol.notify({
      appName,
      replacesId,
      icon: appIcon,
      summary,
      body,
      actions,
      hints: unwrapHints(hints),
      expireTimeout,
    });
  }

  CloseNotification(id: number): void {
    this.protocol.closeNotification(id);
  }

  GetCapabilities(): string[] {
    return this.protocol.getCapabilities();
  }

  GetServerInformation(): [string, string, string, string] {
    const info = this.protocol.getServerInformation();
    return [info.name, info.vendor, info.version, info.specVersion];
  }

  NotificationClosed(id: number, reason: number): [number, number] {
    return [id, reason];
  }

  ActionInvoked(id: number, actionKey: string): [number, string] {
    return [id, actionKey];
  }
}

NotificationsInterface.configureMembers({
  methods: {
    Notify: { inSignature: 'susssasa{sv}i', outSignature: 'u' },
    CloseNotification: { inSignature: 'u', outSignature: '' },
    GetCapabilities: { inSignature: '', outSignature: 'as' },
    GetServerInformation: { inSignature: '', outSignature: 'ssss' },
  },
  signals: {
    NotificationClosed: { signature: 'uu' },
    ActionInvoked: { signature: 'us' },
  },
});

export class ControlInterface extends dbus.interface.Interface {
  constructor(private protocol: NotificationProtocol) {
    super(CONTROL_INTERFACE);
  }

  ToggleCenter(): void {
    this.protocol.toggleCenter();
  }
}

ControlInterface.configureMembers({
  methods: {
    ToggleCenter: { inSignature: '', outSignature: '' },
  },
});

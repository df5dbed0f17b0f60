/**
 * @xnotid/server
 *
 * Notification daemon: D-Bus protocol server, renderer bridge, journal and
 * configuration loading around the core engine.
 */

export { startDaemon, readDaemonVersion, type Daemon, type DaemonOptions } from './start-server.js';

export {
  loadDaemonConfig,
  parseDaemonConfig,
  resolveConfigPath,
  defaultJournalPath,
  getDefaultConfig,
  type LoadedConfig,
  type LoadConfigOptions,
} from './config/daemon-config.js';

export {
  NotificationProtocol,
  toSignal,
  fromWireTimeout,
  type NotifyCall,
  type ProtocolSignal,
  type SignalListener,
} from './protocol/notification-protocol.js';

export {
  DbusServer,
  BusNameError,
  BusConnectionError,
  NOTIFICATIONS_BUS_NAME,
  NOTIFICATIONS_OBJECT_PATH,
  CONTROL_BUS_NAME,
  CONTROL_OBJECT_PATH,
  type BusConnection,
} from './protocol/dbus-server.js';

export {
  NotificationsInterface,
  ControlInterface,
  NOTIFICATIONS_INTERFACE,
  CONTROL_INTERFACE,
  unwrapHints,
} from './protocol/dbus-interfaces.js';

export {
  RendererBridge,
  BridgeRequestError,
  parseRendererMessage,
  toServerMessage,
  toRendererNotification,
} from './renderer/renderer-bridge.js';

export type {
  DisplaySettings,
  RendererNotification,
  RendererPopup,
  ServerMessage,
  RendererMessage,
  HelloMessage,
} from './renderer/types.js';

export { NotificationJournal, toJournalEntry, type JournalEntry, type JournalEventKind } from './journal/notification-journal.js';

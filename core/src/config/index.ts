export type {
  DaemonConfig,
  EngineConfig,
  PopupCorner,
  UrgencyTimeouts,
  JournalConfig,
  BridgeConfig,
} from "./types.js";
export { DEFAULT_DAEMON_CONFIG, POPUP_CORNERS } from "./defaults.js";

/**
 * Daemon configuration types.
 *
 * The daemon loads one snapshot at startup and never mutates it.
 */

export type PopupCorner =
  | "top-left"
  | "top-right"
  | "bottom-left"
  | "bottom-right"
  | "top-center"
  | "bottom-center";

/** Default expiry per urgency, in milliseconds. 0 means never expire. */
export interface UrgencyTimeouts {
  low: number;
  normal: number;
  critical: number;
}

export interface JournalConfig {
  enabled: boolean;
  path: string;
}

export interface BridgeConfig {
  host: string;
  port: number;
}

export interface DaemonConfig {
  /** Monitor index the renderer places popups on */
  monitor: number;
  corner: PopupCorner;
  popupWidth: number;
  /** Maximum number of popups on screen at once */
  maxVisible: number;
  timeouts: UrgencyTimeouts;
  /** Pause expiry while the pointer is over a popup */
  hoverPause: boolean;
  clickToDismiss: boolean;
  closeButtonOnHover: boolean;
  /** Whether do-not-disturb can be switched on */
  dndEnabled: boolean;
  journal: JournalConfig;
  bridge: BridgeConfig;
}

/** The part of the configuration the engine itself consumes. */
export type EngineConfig = Pick<DaemonConfig, "maxVisible" | "timeouts" | "hoverPause" | "dndEnabled">;

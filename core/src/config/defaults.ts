/**
 * Default configuration values.
 */

import type { DaemonConfig, PopupCorner } from "./types.js";

export const POPUP_CORNERS: readonly PopupCorner[] = [
  "top-left",
  "top-right",
  "bottom-left",
  "bottom-right",
  "top-center",
  "bottom-center",
];

/** Everything except the journal path, which depends on the user's home. */
export const DEFAULT_DAEMON_CONFIG: Omit<DaemonConfig, "journal"> & { journal: { enabled: boolean } } = {
  monitor: 0,
  corner: "top-right",
  popupWidth: 400,
  maxVisible: 3,
  timeouts: {
    low: 5_000,
    normal: 10_000,
    critical: 0, // critical notifications stay until dismissed
  },
  hoverPause: true,
  clickToDismiss: true,
  closeButtonOnHover: false,
  dndEnabled: true,
  journal: { enabled: true },
  bridge: { host: "127.0.0.1", port: 4250 },
};

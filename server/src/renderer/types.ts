/**
 * Renderer bridge message types
 *
 * JSON messages exchanged with whatever process draws popups and the
 * notification center.
 */

import type {
  CenterEntry,
  NotificationAction,
  NotificationCard,
  NotificationDetails,
  PopupCorner,
} from '@xnotid/core';

/** What a renderer needs to draw a popup. Hints stay server-side. */
export interface RendererNotification {
  id: number;
  appName: string;
  summary: string;
  body: string;
  icon: string;
  actions: NotificationAction[];
  details: NotificationDetails;
  card: NotificationCard | null;
  acknowledgeToDismiss: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface DisplaySettings {
  monitor: number;
  corner: PopupCorner;
  popupWidth: number;
  clickToDismiss: boolean;
  closeButtonOnHover: boolean;
}

export interface RendererPopup {
  slot: number;
  notification: RendererNotification;
}

// ============================================================
// Server → renderer
// ============================================================

export interface HelloMessage {
  type: 'hello';
  display: DisplaySettings;
  popups: RendererPopup[];
  center: CenterEntry[];
  centerVisible: boolean;
  doNotDisturb: boolean;
}

export interface ShowPopupMessage {
  type: 'show_popup';
  slot: number;
  notification: RendererNotification;
}

export interface UpdatePopupMessage {
  type: 'update_popup';
  slot: number;
  notification: RendererNotification;
}

export interface RemovePopupMessage {
  type: 'remove_popup';
  slot: number;
  id: number;
}

export interface ShowCenterMessage {
  type: 'show_center';
  entries: CenterEntry[];
}

export interface HideCenterMessage {
  type: 'hide_center';
}

export interface DndChangedMessage {
  type: 'dnd_changed';
  enabled: boolean;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | HelloMessage
  | ShowPopupMessage
  | UpdatePopupMessage
  | RemovePopupMessage
  | ShowCenterMessage
  | HideCenterMessage
  | DndChangedMessage
  | ErrorMessage;

// ============================================================
// Renderer → server
// ============================================================

export interface DismissRequest {
  type: 'dismiss';
  id: number;
}

export interface InvokeActionRequest {
  type: 'invoke_action';
  id: number;
  key: string;
}

export interface SubmitChoicesRequest {
  type: 'submit_choices';
  id: number;
  selected: string[];
  other: string | null;
}

export interface HoverRequest {
  type: 'hover';
  id: number;
  inside: boolean;
}

export interface ToggleCenterRequest {
  type: 'toggle_center';
}

export interface AcknowledgeRequest {
  type: 'acknowledge';
  id: number;
}

export interface ClearCenterRequest {
  type: 'clear_center';
}

export interface ToggleDndRequest {
  type: 'toggle_dnd';
}

export type RendererMessage =
  | DismissRequest
  | InvokeActionRequest
  | SubmitChoicesRequest
  | HoverRequest
  | ToggleCenterRequest
  | AcknowledgeRequest
  | ClearCenterRequest
  | ToggleDndRequest;

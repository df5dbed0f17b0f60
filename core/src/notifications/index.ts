/**
 * @xnotid/core/notifications — barrel export
 *
 * Single source of truth for notification types, constants and hint decoding.
 */

export type {
  Urgency,
  CloseReason,
  NotificationState,
  NotificationAction,
  HintBag,
  NotificationImage,
  NotificationRequest,
  NotificationDetails,
  NotificationRecord,
  NotificationView,
  CenterEntry,
  CenterEntryOrigin,
  RenderIntent,
  ServerInformation,
} from "./types.js";

export {
  CLOSE_REASON_CODES,
  URGENCY_BY_LEVEL,
  URGENCY_LEVELS,
  SERVER_CAPABILITIES,
  SERVER_NAME,
  SERVER_VENDOR,
  PROTOCOL_SPEC_VERSION,
  MAX_NOTIFICATION_ID,
  PERMISSION_ALLOW_KEY,
} from "./constants.js";

export {
  pairActions,
  hintString,
  hintBoolean,
  hintInteger,
  parseUrgency,
  resolveImage,
  parseNotificationDetails,
} from "./hints.js";

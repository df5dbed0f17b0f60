/**
 * @xnotid/core/cards — barrel export
 */

export type {
  CardChoice,
  CardType,
  ChoiceResponse,
  MultipleChoiceCard,
  NotificationCard,
  PermissionCard,
} from "./types.js";

export { MalformedCardError, InvalidCardResponseError } from "./errors.js";

export {
  parseCard,
  CARD_MARKER,
  CARD_VERSION,
  DEFAULT_ALLOW_LABEL,
  type CardParseResult,
} from "./card-parser.js";

export { buildChoiceResponse, cardActionKeys } from "./card-response.js";

/**
 * Card types.
 *
 * A card is an interactive payload embedded in a notification body as a
 * tagged JSON envelope: `{"xnotid_card": "v1", "type": ..., ...}`.
 */

export interface CardChoice {
  id: string;
  label: string;
}

export interface MultipleChoiceCard {
  type: "multiple-choice";
  question: string;
  choices: CardChoice[];
  /** Renderer offers a free-text "other" entry */
  allowOther: boolean;
}

export interface PermissionCard {
  type: "permission";
  question: string;
  allowLabel: string;
}

export type NotificationCard = MultipleChoiceCard | PermissionCard;

export type CardType = NotificationCard["type"];

/** Payload emitted as the action key when a multiple-choice card is submitted. */
export interface ChoiceResponse {
  type: "multiple-choice";
  selected: CardChoice[];
  other: string | null;
}

/**
 * Card responses.
 *
 * What a card sends back as the `ActionInvoked` key once the user answers it.
 */

import { PERMISSION_ALLOW_KEY } from "../notifications/constants.js";
import { InvalidCardResponseError } from "./errors.js";
import type { ChoiceResponse, MultipleChoiceCard, NotificationCard } from "./types.js";

/**
 * Build the action key for a multiple-choice submission.
 *
 * Selections are reported in card order regardless of the order the user
 * picked them in. Blank custom text counts as no custom text.
 */
export function buildChoiceResponse(
  card: MultipleChoiceCard,
  selectedIds: readonly string[],
  other: string | null,
): string {
  const wanted = new Set(selectedIds);
  for (const id of wanted) {
    if (!card.choices.some((choice) => choice.id === id)) {
      throw new InvalidCardResponseError(`unknown choice id "${id}"`);
    }
  }

  const otherText = other?.trim() ? other.trim() : null;
  if (otherText !== null && !card.allowOther) {
    throw new InvalidCardResponseError("card does not accept a custom answer");
  }

  const response: ChoiceResponse = {
    type: "multiple-choice",
    selected: card.choices
      .filter((choice) => wanted.has(choice.id))
      .map((choice) => ({ id: choice.id, label: choice.label })),
    other: otherText,
  };

  return JSON.stringify(response);
}

/** Plain action keys a card answers with (multiple-choice uses buildChoiceResponse). */
export function cardActionKeys(card: NotificationCard): string[] {
  switch (card.type) {
    case "permission":
      return [PERMISSION_ALLOW_KEY];
    case "multiple-choice":
      return [];
  }
}

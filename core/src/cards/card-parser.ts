/**
 * Card Parser
 *
 * Detects and validates the card envelope in a notification body.
 * Pure: the same body always yields the same result.
 */

import { MalformedCardError } from "./errors.js";
import type { CardChoice, NotificationCard } from "./types.js";

export const CARD_MARKER = "xnotid_card";
export const CARD_VERSION = "v1";
export const DEFAULT_ALLOW_LABEL = "Allow";

export type CardParseResult =
  | { kind: "none" }
  | { kind: "card"; card: NotificationCard }
  | { kind: "malformed"; error: MalformedCardError };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readEnvelope(body: string): JsonObject | null {
  const trimmed = body.trim();
  if (!trimmed.startsWith("{")) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isObject(parsed) ? parsed : null;
  } catch {
    // Not JSON: an ordinary text body
    return null;
  }
}

function requireString(envelope: JsonObject, field: string): string {
  const value = envelope[field];
  if (typeof value !== "string") {
    throw new MalformedCardError(`card field "${field}" must be a string`);
  }
  return value;
}

function optionalBoolean(envelope: JsonObject, field: string, fallback: boolean): boolean {
  const value = envelope[field];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw new MalformedCardError(`card field "${field}" must be a boolean`);
  }
  return value;
}

function optionalString(envelope: JsonObject, field: string, fallback: string): string {
  const value = envelope[field];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new MalformedCardError(`card field "${field}" must be a string`);
  }
  return value;
}

function readChoices(envelope: JsonObject): CardChoice[] {
  const raw = envelope.choices;
  if (!Array.isArray(raw)) {
    throw new MalformedCardError('card field "choices" must be an array');
  }

  const seen = new Set<string>();
  return raw.map((item: unknown, index) => {
    const id = isObject(item) ? item.id : undefined;
    const label = isObject(item) ? item.label : undefined;
    if (typeof id !== "string" || typeof label !== "string") {
      throw new MalformedCardError(`choice ${index} needs string "id" and "label"`);
    }
    if (seen.has(id)) {
      throw new MalformedCardError(`duplicate choice id "${id}"`);
    }
    seen.add(id);
    return { id, label };
  });
}

function buildCard(envelope: JsonObject): NotificationCard {
  const type = envelope.type;
  switch (type) {
    case "multiple-choice":
      return {
        type: "multiple-choice",
        question: requireString(envelope, "question"),
        choices: readChoices(envelope),
        allowOther: optionalBoolean(envelope, "allow_other", false),
      };

    case "permission":
      return {
        type: "permission",
        question: requireString(envelope, "question"),
        allowLabel: optionalString(envelope, "allow_label", DEFAULT_ALLOW_LABEL),
      };

    default:
      throw new MalformedCardError(`unknown card type: ${JSON.stringify(type)}`);
  }
}

/**
 * Parse a notification body.
 *
 * Bodies without the marker, or with a marker version this daemon does not
 * speak, are plain notifications (`none`). A recognised marker with a bad
 * envelope is `malformed`; the caller shows it as text.
 */
export function parseCard(body: string): CardParseResult {
  const envelope = readEnvelope(body);
  if (!envelope || envelope[CARD_MARKER] !== CARD_VERSION) {
    return { kind: "none" };
  }

  try {
    return { kind: "card", card: Object.freeze(buildCard(envelope)) };
  } catch (err) {
    if (err instanceof MalformedCardError) {
      return { kind: "malformed", error: err };
    }
    throw err;
  }
}


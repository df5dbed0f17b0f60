/**
 * Card parser tests
 */

import { describe, it, expect } from "@jest/globals";
import { parseCard, MalformedCardError, buildChoiceResponse, cardActionKeys, InvalidCardResponseError } from "./index.js";
import type { MultipleChoiceCard } from "./index.js";

function envelope(fields: Record<string, unknown>): string {
  return JSON.stringify({ xnotid_card: "v1", ...fields });
}

describe("parseCard", () => {
  it("treats plain text as not a card", () => {
    expect(parseCard("Build finished in 3m")).toEqual({ kind: "none" });
  });

  it("treats JSON without the marker as not a card", () => {
    expect(parseCard('{"type":"permission","question":"Q?"}')).toEqual({ kind: "none" });
  });

  it("treats an unknown marker version as not a card", () => {
    const body = JSON.stringify({ xnotid_card: "v2", type: "permission", question: "Q?" });
    expect(parseCard(body)).toEqual({ kind: "none" });
  });

  it("treats broken JSON and JSON arrays as not a card", () => {
    expect(parseCard('{"xnotid_card": "v1", ')).toEqual({ kind: "none" });
    expect(parseCard('[{"xnotid_card": "v1"}]')).toEqual({ kind: "none" });
  });

  it("parses a multiple-choice card", () => {
    const result = parseCard(envelope({
      type: "multiple-choice",
      question: "Which branch?",
      choices: [
        { id: "main", label: "main" },
        { id: "dev", label: "develop" },
      ],
      allow_other: true,
    }));

    expect(result).toEqual({
      kind: "card",
      card: {
        type: "multiple-choice",
        question: "Which branch?",
        choices: [
          { id: "main", label: "main" },
          { id: "dev", label: "develop" },
        ],
        allowOther: true,
      },
    });
  });

  it("defaults allow_other to false", () => {
    const result = parseCard(envelope({
      type: "multiple-choice",
      question: "Pick one",
      choices: [{ id: "a", label: "A" }],
    }));

    expect(result.kind).toBe("card");
    if (result.kind === "card" && result.card.type === "multiple-choice") {
      expect(result.card.allowOther).toBe(false);
    }
  });

  it("parses a permission card with the default allow label", () => {
    const result = parseCard(envelope({ type: "permission", question: "Run rm -rf build?" }));

    expect(result).toEqual({
      kind: "card",
      card: { type: "permission", question: "Run rm -rf build?", allowLabel: "Allow" },
    });
  });

  it("keeps a custom allow label", () => {
    const result = parseCard(envelope({ type: "permission", question: "Deploy?", allow_label: "Ship it" }));

    expect(result).toEqual({
      kind: "card",
      card: { type: "permission", question: "Deploy?", allowLabel: "Ship it" },
    });
  });

  it("freezes the parsed card", () => {
    const result = parseCard(envelope({ type: "permission", question: "Q?" }));
    expect(result.kind === "card" && Object.isFrozen(result.card)).toBe(true);
  });

  describe("malformed envelopes", () => {
    const cases: Array<[string, Record<string, unknown>, string]> = [
      ["unknown type", { type: "slider", question: "Volume?" }, 'unknown card type: "slider"'],
      ["missing type", { question: "Q?" }, "unknown card type: undefined"],
      ["missing question", { type: "permission" }, 'card field "question" must be a string'],
      ["choices not an array", { type: "multiple-choice", question: "Q?", choices: "a,b" }, 'card field "choices" must be an array'],
      ["choice without label", { type: "multiple-choice", question: "Q?", choices: [{ id: "a" }] }, 'choice 0 needs string "id" and "label"'],
      [
        "duplicate choice ids",
        { type: "multiple-choice", question: "Q?", choices: [{ id: "a", label: "A" }, { id: "a", label: "B" }] },
        'duplicate choice id "a"',
      ],
      ["non-boolean allow_other", { type: "multiple-choice", question: "Q?", choices: [], allow_other: "yes" }, 'card field "allow_other" must be a boolean'],
    ];

    it.each(cases)("rejects %s", (_name, fields, message) => {
      const result = parseCard(envelope(fields));

      expect(result.kind).toBe("malformed");
      if (result.kind === "malformed") {
        expect(result.error).toBeInstanceOf(MalformedCardError);
        expect(result.error.message).toBe(message);
      }
    });
  });
});

describe("buildChoiceResponse", () => {
  const card: MultipleChoiceCard = {
    type: "multiple-choice",
    question: "Which tests?",
    choices: [
      { id: "unit", label: "Unit" },
      { id: "e2e", label: "End to end" },
      { id: "lint", label: "Lint" },
    ],
    allowOther: true,
  };

  it("reports selections in card order", () => {
    const key = buildChoiceResponse(card, ["lint", "unit"], null);

    expect(JSON.parse(key)).toEqual({
      type: "multiple-choice",
      selected: [
        { id: "unit", label: "Unit" },
        { id: "lint", label: "Lint" },
      ],
      other: null,
    });
  });

  it("trims custom text and maps blank text to null", () => {
    expect(JSON.parse(buildChoiceResponse(card, [], "  smoke  ")).other).toBe("smoke");
    expect(JSON.parse(buildChoiceResponse(card, ["e2e"], "   ")).other).toBeNull();
  });

  it("serializes with type first", () => {
    expect(buildChoiceResponse(card, ["e2e"], null)).toBe(
      '{"type":"multiple-choice","selected":[{"id":"e2e","label":"End to end"}],"other":null}',
    );
  });

  it("rejects unknown choice ids", () => {
    expect(() => buildChoiceResponse(card, ["perf"], null)).toThrow(InvalidCardResponseError);
  });

  it("rejects custom text when the card does not allow it", () => {
    const closed: MultipleChoiceCard = { ...card, allowOther: false };
    expect(() => buildChoiceResponse(closed, [], "other")).toThrow("card does not accept a custom answer");
  });
});

describe("cardActionKeys", () => {
  it("gives permission cards the allow key", () => {
    expect(cardActionKeys({ type: "permission", question: "Q?", allowLabel: "Allow" })).toEqual(["allow"]);
  });

  it("gives multiple-choice cards no plain keys", () => {
    expect(cardActionKeys({ type: "multiple-choice", question: "Q?", choices: [], allowOther: false })).toEqual([]);
  });
});

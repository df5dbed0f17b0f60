/**
 * Tests for the renderer-bridge backed commands against a fake session
 */

import { describe, it, expect } from "@jest/globals";
import type { HelloMessage, RendererMessage } from "@xnotid/server";
import { isDndReply, requestDndToggle } from "./dnd.js";
import { requestClearCenter } from "./clear.js";

function fakeSession(reply: unknown): {
  sent: RendererMessage[];
  send: (message: RendererMessage) => void;
  waitFor: <T>(guard: (message: unknown) => message is T) => Promise<T>;
} {
  const sent: RendererMessage[] = [];
  return {
    sent,
    send: (message) => {
      sent.push(message);
    },
    waitFor: <T>(guard: (message: unknown) => message is T) =>
      guard(reply) ? Promise.resolve(reply) : Promise.reject(new Error("unexpected reply")),
  };
}

describe("isDndReply", () => {
  it("accepts dnd_changed and error replies", () => {
    expect(isDndReply({ type: "dnd_changed", enabled: false })).toBe(true);
    expect(isDndReply({ type: "error", message: "nope" })).toBe(true);
  });

  it("rejects other messages and malformed replies", () => {
    expect(isDndReply({ type: "show_center", entries: [] })).toBe(false);
    expect(isDndReply({ type: "dnd_changed", enabled: "yes" })).toBe(false);
    expect(isDndReply({ type: "error" })).toBe(false);
    expect(isDndReply("dnd_changed")).toBe(false);
  });
});

describe("requestDndToggle", () => {
  it("sends toggle_dnd and describes the new state", async () => {
    const session = fakeSession({ type: "dnd_changed", enabled: true });

    await expect(requestDndToggle(session)).resolves.toBe("Do not disturb on");
    expect(session.sent).toEqual([{ type: "toggle_dnd" }]);
  });

  it("surfaces the daemon's refusal", async () => {
    const session = fakeSession({ type: "error", message: "do-not-disturb is disabled in the configuration" });

    await expect(requestDndToggle(session)).rejects.toThrow("do-not-disturb is disabled in the configuration");
  });
});

describe("requestClearCenter", () => {
  it("sends clear_center and reports how many entries were dropped", () => {
    const sent: RendererMessage[] = [];
    const hello: HelloMessage = {
      type: "hello",
      display: { monitor: 0, corner: "top-right", popupWidth: 400, clickToDismiss: true, closeButtonOnHover: false },
      popups: [],
      center: [
        {
          id: 3,
          appName: "mail",
          summary: "Inbox",
          body: "",
          icon: "",
          urgency: "normal",
          image: { kind: "none" },
          card: null,
          actions: [],
          group: null,
          origin: "archived",
          createdAt: 0,
          enqueuedAt: 0,
        },
      ],
      centerVisible: true,
      doNotDisturb: false,
    };

    const line = requestClearCenter({ hello, send: (message) => sent.push(message) });

    expect(line).toBe("Cleared 1 center entries");
    expect(sent).toEqual([{ type: "clear_center" }]);
  });
});

/**
 * Notification Store Tests
 */

import { describe, it, expect } from "@jest/globals";
import { NotificationStore, type NotificationFields } from "./notification-store.js";
import { InvalidTransitionError } from "./errors.js";
import { MAX_NOTIFICATION_ID } from "../notifications/constants.js";
import { parseNotificationDetails } from "../notifications/hints.js";

function fields(overrides: Partial<NotificationFields> = {}): NotificationFields {
  return {
    appName: "test-app",
    summary: "Hello",
    body: "",
    icon: "",
    actions: [],
    hints: {},
    expireTimeout: 0,
    details: parseNotificationDetails({}, ""),
    card: null,
    acknowledgeToDismiss: false,
    ...overrides,
  };
}

describe("NotificationStore", () => {
  it("mints ids starting at 1 in the queued state", () => {
    const store = new NotificationStore();

    const first = store.create(fields());
    const second = store.create(fields());

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.state).toBe("queued");
    expect(store.size).toBe(2);
  });

  it("does not reuse an id right after it is freed", () => {
    const store = new NotificationStore();
    const first = store.create(fields());
    store.transition(first.id, "archived");
    store.remove(first.id);

    expect(store.create(fields()).id).toBe(2);
  });

  it("wraps from the top of the id space back to 1", () => {
    const store = new NotificationStore({ firstId: MAX_NOTIFICATION_ID });

    expect(store.create(fields()).id).toBe(MAX_NOTIFICATION_ID);
    expect(store.create(fields()).id).toBe(1);
  });

  it("never hands out 0", () => {
    const store = new NotificationStore({ firstId: 0 });
    expect(store.create(fields()).id).toBe(1);
  });

  it("replaces in place, keeping state and creation time", () => {
    let clock = 1_000;
    const store = new NotificationStore({ now: () => clock });
    const created = store.create(fields({ summary: "Old" }));
    store.transition(created.id, "visible");

    clock = 2_000;
    const replaced = store.replace(created.id, fields({ summary: "New" }));

    expect(replaced).toMatchObject({
      id: created.id,
      summary: "New",
      state: "visible",
      createdAt: 1_000,
      updatedAt: 2_000,
    });
  });

  it("returns null when replacing an id that is not live", () => {
    const store = new NotificationStore();
    expect(store.replace(7, fields())).toBeNull();
  });

  it("hands out frozen copies", () => {
    const store = new NotificationStore();
    const view = store.create(fields({ actions: [{ key: "open", label: "Open" }] }));

    expect(Object.isFrozen(view)).toBe(true);
    expect(store.get(view.id)).not.toBe(view);
  });

  describe("transitions", () => {
    it("walks visible records through an outcome to closed", () => {
      const store = new NotificationStore();
      const { id } = store.create(fields());

      store.transition(id, "visible");
      store.transition(id, "expired");
      store.transition(id, "closed");
      store.remove(id);

      expect(store.get(id)).toBeUndefined();
      expect(store.size).toBe(0);
    });

    it("rejects transitions the lifecycle does not allow", () => {
      const store = new NotificationStore();
      const { id } = store.create(fields());
      store.transition(id, "visible");

      expect(() => store.transition(id, "archived")).toThrow(
        new InvalidTransitionError(id, "visible", "archived"),
      );
      expect(() => store.transition(id, "archived")).toThrow(
        "notification 1: cannot go from visible to archived",
      );
    });

    it("rejects transitions of unknown ids", () => {
      const store = new NotificationStore();
      expect(() => store.transition(3, "visible")).toThrow(InvalidTransitionError);
    });

    it("only removes closed or archived records", () => {
      const store = new NotificationStore();
      const { id } = store.create(fields());
      store.transition(id, "visible");

      expect(() => store.remove(id)).toThrow("notification 1: cannot go from visible to removed");
    });
  });
});

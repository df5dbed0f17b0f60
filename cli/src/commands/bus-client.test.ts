/**
 * Tests for the session bus helper
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { EventEmitter } from "events";
import { Message } from "dbus-next";
import { withSessionBus, type SessionBus } from "./bus-client.js";

class FakeSessionBus extends EventEmitter implements SessionBus {
  calls: Message[] = [];
  reply: Message | null = null;
  stalled = false;
  disconnected = false;

  call(message: Message): Promise<Message | null> {
    this.calls.push(message);
    if (this.stalled) return new Promise<Message | null>(() => {});
    return Promise.resolve(this.reply);
  }

  disconnect(): void {
    this.disconnected = true;
  }
}

describe("withSessionBus", () => {
  let bus: FakeSessionBus;
  let errorSpy: ReturnType<typeof jest.spyOn>;

  beforeEach(() => {
    bus = new FakeSessionBus();
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it("sends the method call and hands back the reply body", async () => {
    bus.reply = new Message({
      path: "/org/freedesktop/Notifications",
      interface: "org.freedesktop.Notifications",
      member: "Notify",
      signature: "u",
      body: [42],
    });
    let body: unknown[] = [];

    await withSessionBus(
      async (call) => {
        body = await call({
          destination: "org.freedesktop.Notifications",
          path: "/org/freedesktop/Notifications",
          iface: "org.freedesktop.Notifications",
          member: "CloseNotification",
          signature: "u",
          body: [7],
        });
      },
      { connect: () => bus },
    );

    expect(body).toEqual([42]);
    expect(bus.calls).toHaveLength(1);
    expect(bus.calls[0]).toMatchObject({
      destination: "org.freedesktop.Notifications",
      interface: "org.freedesktop.Notifications",
      member: "CloseNotification",
      body: [7],
    });
    expect(bus.disconnected).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it("reports a bus that fails while a call is pending", async () => {
    bus.stalled = true;

    const done = withSessionBus(
      async (call) => {
        await call({ destination: "org.xnotid.Control", path: "/org/xnotid/Control", iface: "org.xnotid.Control", member: "ToggleCenter" });
      },
      { connect: () => bus },
    );
    bus.emit("error", new Error("connect ENOENT /run/user/1000/bus"));
    await done;

    expect(errorSpy).toHaveBeenCalledWith("Could not connect to the session bus: connect ENOENT /run/user/1000/bus");
    expect(process.exitCode).toBe(1);
    expect(bus.disconnected).toBe(true);
  });

  it("reports a bus that cannot be opened", async () => {
    const action = jest.fn(async () => {});

    await withSessionBus(action, {
      connect: () => {
        throw new Error("DBUS_SESSION_BUS_ADDRESS is not set");
      },
    });

    expect(action).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith("Could not connect to the session bus: DBUS_SESSION_BUS_ADDRESS is not set");
    expect(process.exitCode).toBe(1);
  });

  it("gives up on a daemon that never answers", async () => {
    bus.stalled = true;

    await withSessionBus(
      async (call) => {
        await call({ destination: "org.xnotid.Control", path: "/org/xnotid/Control", iface: "org.xnotid.Control", member: "ToggleCenter" });
      },
      { connect: () => bus, timeoutMs: 10 },
    );

    expect(errorSpy).toHaveBeenCalledWith("Could not reach xnotid: no reply within 10ms");
    expect(process.exitCode).toBe(1);
  });
});

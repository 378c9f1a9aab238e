import { describe, expect, it } from "vitest";
import { Channel, ChannelClosedError } from "../channel.js";

interface Item {
  id: number;
}

describe("Channel", () => {
  it("should hand a value from sender to a waiting receiver", async () => {
    const channel = new Channel<Item>();

    const received = channel.receive();
    await channel.send({ id: 1 });

    await expect(received).resolves.toEqual({ id: 1 });
  });

  it("should block the sender until a receiver takes the value", async () => {
    const channel = new Channel<Item>();
    let delivered = false;

    const sending = channel.send({ id: 1 }).then(() => {
      delivered = true;
    });
    await Promise.resolve();

    expect(delivered).toBe(false);
    expect(channel.pendingSends).toBe(1);

    await expect(channel.receive()).resolves.toEqual({ id: 1 });
    await sending;
    expect(delivered).toBe(true);
    expect(channel.pendingSends).toBe(0);
  });

  it("should deliver values in send order", async () => {
    const channel = new Channel<Item>();

    const sends = [channel.send({ id: 1 }), channel.send({ id: 2 }), channel.send({ id: 3 })];
    const received = [await channel.receive(), await channel.receive(), await channel.receive()];
    await Promise.all(sends);

    expect(received).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
  });

  it("should serve waiting receivers first-come first-served", async () => {
    const channel = new Channel<Item>();

    const first = channel.receive();
    const second = channel.receive();
    await channel.send({ id: 1 });
    await channel.send({ id: 2 });

    await expect(first).resolves.toEqual({ id: 1 });
    await expect(second).resolves.toEqual({ id: 2 });
  });

  it("should resolve a receive with undefined when the signal aborts", async () => {
    const channel = new Channel<Item>();
    const controller = new AbortController();

    const pending = channel.receive(controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeUndefined();

    // the aborted receiver must not swallow the next value
    const next = channel.receive();
    await channel.send({ id: 9 });
    await expect(next).resolves.toEqual({ id: 9 });
  });

  it("should return undefined immediately for an already aborted signal", async () => {
    const channel = new Channel<Item>();
    await expect(channel.receive(AbortSignal.abort())).resolves.toBeUndefined();
  });

  describe("close()", () => {
    it("should wake pending receivers with undefined", async () => {
      const channel = new Channel<Item>();
      const pending = channel.receive();

      channel.close();

      await expect(pending).resolves.toBeUndefined();
      expect(channel.closed).toBe(true);
    });

    it("should reject pending and later senders", async () => {
      const channel = new Channel<Item>();
      const pending = channel.send({ id: 1 });

      channel.close();

      await expect(pending).rejects.toBeInstanceOf(ChannelClosedError);
      await expect(channel.send({ id: 2 })).rejects.toThrow("send on closed channel");
    });

    it("should be idempotent", () => {
      const channel = new Channel<Item>();
      channel.close();
      expect(() => channel.close()).not.toThrow();
    });
  });

  it("should be async-iterable until closed", async () => {
    const channel = new Channel<Item>();
    const seen: number[] = [];

    const consuming = (async () => {
      for await (const item of channel) {
        seen.push(item.id);
      }
    })();

    await channel.send({ id: 1 });
    await channel.send({ id: 2 });
    channel.close();
    await consuming;

    expect(seen).toEqual([1, 2]);
  });
});

import { describe, expect, test } from "vitest";
import { AsyncEventChannel } from "../src/events/channel";
import { silentLogger } from "../src/logging/logger";

describe("AsyncEventChannel", () => {
  test("runs handlers in subscription order and awaits each", async () => {
    const channel = new AsyncEventChannel<string>("test", silentLogger());
    const calls: string[] = [];
    channel.subscribe(async (payload) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      calls.push(`first:${payload}`);
    });
    channel.subscribe((payload) => {
      calls.push(`second:${payload}`);
    });

    await channel.notify("ping");

    expect(calls).toEqual(["first:ping", "second:ping"]);
  });

  test("keeps notifying after a handler throws", async () => {
    const channel = new AsyncEventChannel<string>("test", silentLogger());
    const calls: string[] = [];
    channel.subscribe(() => {
      throw new Error("handler failed");
    });
    channel.subscribe((payload) => {
      calls.push(payload);
    });

    await expect(channel.notify("ping")).resolves.toBeUndefined();
    expect(calls).toEqual(["ping"]);
  });

  test("unsubscribes a handler", async () => {
    const channel = new AsyncEventChannel<string>("test", silentLogger());
    const calls: string[] = [];
    const unsubscribe = channel.subscribe((payload) => {
      calls.push(payload);
    });

    unsubscribe();
    await channel.notify("ping");

    expect(calls).toEqual([]);
    expect(channel.handlerCount).toBe(0);
  });
});

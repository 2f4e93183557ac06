/**
 * Status Channel Tests
 */
import { describe, expect, it } from "vitest";
import { createStatusChannel } from "../channel.js";

describe("Status Channel", () => {
  it("delivers buffered items in order", async () => {
    const channel = createStatusChannel<number>(5);
    channel.push(1);
    channel.push(2);
    channel.close();

    const seen: number[] = [];
    for await (const item of channel) {
      seen.push(item);
    }
    expect(seen).toEqual([1, 2]);
  });

  it("drops the oldest item when full and counts it", async () => {
    const channel = createStatusChannel<number>(2);
    channel.push(1);
    channel.push(2);
    channel.push(3);

    expect(channel.size()).toBe(2);
    expect(channel.getDroppedCount()).toBe(1);

    const iterator = channel[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 2, done: false });
    expect(await iterator.next()).toEqual({ value: 3, done: false });
  });

  it("wakes a waiting reader on push", async () => {
    const channel = createStatusChannel<string>(1);
    const iterator = channel[Symbol.asyncIterator]();

    const pending = iterator.next();
    channel.push("hello");

    expect(await pending).toEqual({ value: "hello", done: false });
    expect(channel.size()).toBe(0);
  });

  it("ends waiting readers on close", async () => {
    const channel = createStatusChannel<number>(1);
    const iterator = channel[Symbol.asyncIterator]();

    const pending = iterator.next();
    channel.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(channel.isClosed()).toBe(true);
  });

  it("ignores pushes after close", async () => {
    const channel = createStatusChannel<number>(1);
    channel.close();
    channel.push(1);

    expect(channel.size()).toBe(0);
    expect(await channel[Symbol.asyncIterator]().next()).toEqual({ value: undefined, done: true });
  });

  it("rejects a non-positive capacity", () => {
    expect(() => createStatusChannel<number>(0)).toThrow(RangeError);
  });
});

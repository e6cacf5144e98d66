import { describe, it, expect } from "vitest";
import { RingBuffer } from "../src/engines/history.js";

describe("RingBuffer", () => {
  it("grows without bound when no capacity is set", () => {
    const buf = new RingBuffer<number>();
    for (let i = 0; i < 100; i++) expect(buf.push(i)).toBeUndefined();
    expect(buf.length).toBe(100);
    expect(buf.at(0)).toBe(0);
    expect(buf.last()).toBe(99);
  });

  it("evicts the oldest item once full", () => {
    const buf = new RingBuffer<string>(3);
    buf.push("a");
    buf.push("b");
    buf.push("c");
    expect(buf.push("d")).toBe("a");
    expect(buf.push("e")).toBe("b");
    expect(buf.toArray()).toEqual(["c", "d", "e"]);
    expect([...buf]).toEqual(["c", "d", "e"]);
    expect(buf.at(0)).toBe("c");
    expect(buf.last()).toBe("e");
    expect(buf.at(3)).toBeUndefined();
  });

  it("resizes keeping the most recent items", () => {
    const buf = new RingBuffer<number>(4);
    for (let i = 1; i <= 6; i++) buf.push(i);
    const { buffer, dropped } = buf.resize(2);
    expect(dropped).toEqual([3, 4]);
    expect(buffer.toArray()).toEqual([5, 6]);
    expect(buffer.capacity).toBe(2);

    const grown = buffer.resize(undefined);
    expect(grown.dropped).toEqual([]);
    grown.buffer.push(7);
    expect(grown.buffer.toArray()).toEqual([5, 6, 7]);
  });

  it("rejects a non-positive or fractional capacity", () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
    expect(() => new RingBuffer(2.5)).toThrow(RangeError);
  });
});

import { describe, expect, it } from "vitest";
import { LineFramer } from "./line-framer";

const bytes = (...values: number[]) => new Uint8Array(values);

describe("LineFramer", () => {
  it("holds a partial frame until its terminator arrives", () => {
    const framer = new LineFramer();

    expect(framer.push('{"a":1}\n{"b"')).toEqual(['{"a":1}']);
    expect(framer.buffered).toBe(4);
    expect(framer.push(":2}\n")).toEqual(['{"b":2}']);
    expect(framer.buffered).toBe(0);
  });

  it("returns every frame of a coalesced chunk in order", () => {
    const framer = new LineFramer();

    expect(framer.push("one\ntwo\nthree\n")).toEqual(["one", "two", "three"]);
  });

  it("strips carriage returns and skips blank lines", () => {
    const framer = new LineFramer();

    expect(framer.push("a\r\n\r\n\n  \nb\n")).toEqual(["a", "b"]);
  });

  it("reassembles a multi-byte character split across reads", () => {
    const framer = new LineFramer();

    expect(framer.push(bytes(0x22, 0xc3))).toEqual([]);
    expect(framer.push(bytes(0xa9, 0x22, 0x0a))).toEqual(['"é"']);
  });

  it("discards a partial frame that grows past the limit", () => {
    const discarded: number[] = [];
    const framer = new LineFramer(8, (length) => discarded.push(length));

    expect(framer.push("0123456789")).toEqual([]);
    expect(discarded).toEqual([10]);
    expect(framer.buffered).toBe(0);

    expect(framer.push("ab\n")).toEqual(["ab"]);
  });

  it("counts the limit in UTF-8 bytes", () => {
    const discarded: number[] = [];
    const framer = new LineFramer(8, (size) => discarded.push(size));

    expect(framer.push("éééé")).toEqual([]);
    expect(framer.buffered).toBe(8);
    expect(discarded).toEqual([]);

    expect(framer.push("é")).toEqual([]);
    expect(discarded).toEqual([10]);
    expect(framer.buffered).toBe(0);
  });

  it("reset drops the buffered segment", () => {
    const framer = new LineFramer();
    framer.push("half");

    framer.reset();

    expect(framer.push("line\n")).toEqual(["line"]);
  });
});

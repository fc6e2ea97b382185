import { describe, test, expect } from "vitest";
import { Cursor } from "./cursor.js";

describe("Cursor", () => {
  test("starts at line 1, offset 0", () => {
    const cursor = Cursor.from("abc");
    expect(cursor.position).toEqual({ line: 1, offset: 0 });
    expect(cursor.fragment).toBe("abc");
    expect(cursor.atEnd).toBe(false);
  });

  test("advance counts newlines and leaves the original untouched", () => {
    const start = Cursor.from("one\ntwo\nthree");
    const moved = start.advance(8);
    expect(moved.position).toEqual({ line: 3, offset: 8 });
    expect(moved.fragment).toBe("three");
    expect(start.position).toEqual({ line: 1, offset: 0 });
  });

  test("advance stops at the end of the text", () => {
    const cursor = Cursor.from("ab\n").advance(10);
    expect(cursor.offset).toBe(3);
    expect(cursor.line).toBe(2);
    expect(cursor.atEnd).toBe(true);
  });

  test("match anchors at the cursor even for non-sticky patterns", () => {
    const cursor = Cursor.from("abc123").advance(3);
    expect(cursor.match(/\d+/)).toBe("123");
    expect(Cursor.from("abc123").match(/\d+/)).toBeNull();
  });

  test("spanTo and sliceTo cover the consumed text", () => {
    const start = Cursor.from("x\n{{ y }}").advance(2);
    const end = start.advance(7);
    expect(start.sliceTo(end)).toBe("{{ y }}");
    expect(start.spanTo(end)).toEqual({
      start: { line: 2, offset: 2 },
      end: { line: 2, offset: 9 },
    });
  });

  test("peek and startsWith look ahead without consuming", () => {
    const cursor = Cursor.from("<?meta");
    expect(cursor.peek()).toBe("<");
    expect(cursor.peek(1)).toBe("?");
    expect(cursor.peek(10)).toBe("");
    expect(cursor.startsWith("<?")).toBe(true);
    expect(cursor.offset).toBe(0);
  });
});

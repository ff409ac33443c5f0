import { describe, expect, it } from "vitest";

import { Cursor } from "../cursor.ts";

const UNIT = 4;

describe("Cursor", () => {
  describe("advance", () => {
    it("returns the same cursor for a zero-length advance", () => {
      const cursor = new Cursor(1, 2);
      expect(cursor.advance(0, UNIT)).toBe(cursor);
    });

    it("stays at the end of a block when landing on a boundary", () => {
      const cursor = Cursor.START.advance(4, UNIT);
      expect(cursor.block).toBe(0);
      expect(cursor.offset).toBe(4);
    });

    it("moves past a block-end cursor into the next block", () => {
      const cursor = new Cursor(0, 4).advance(1, UNIT);
      expect(cursor).toEqual(new Cursor(1, 1));
    });

    it("crosses several blocks", () => {
      const cursor = new Cursor(0, 2).advance(9, UNIT);
      expect(cursor).toEqual(new Cursor(2, 3));
    });
  });

  describe("distanceTo", () => {
    it("measures bytes between cursors", () => {
      expect(new Cursor(0, 2).distanceTo(new Cursor(2, 3), UNIT)).toBe(9);
      expect(new Cursor(2, 3).distanceTo(new Cursor(0, 2), UNIT)).toBe(-9);
    });

    it("treats a block end and the next block start as the same position", () => {
      const end = new Cursor(0, 4);
      const start = new Cursor(1, 0);
      expect(end.distanceTo(start, UNIT)).toBe(0);
      expect(end).not.toEqual(start);
    });

    it("measures across a block end", () => {
      expect(new Cursor(0, 3).distanceTo(new Cursor(1, 1), UNIT)).toBe(2);
    });
  });

  describe("rolled", () => {
    it("moves a block-end cursor to the next block", () => {
      expect(new Cursor(0, 4).rolled(UNIT)).toEqual(new Cursor(1, 0));
    });

    it("leaves other cursors untouched", () => {
      const cursor = new Cursor(0, 3);
      expect(cursor.rolled(UNIT)).toBe(cursor);
    });
  });

  describe("shifted", () => {
    it("renumbers the block after leading blocks are removed", () => {
      expect(new Cursor(3, 2).shifted(2)).toEqual(new Cursor(1, 2));
    });

    it("returns the same cursor when nothing is removed", () => {
      const cursor = new Cursor(3, 2);
      expect(cursor.shifted(0)).toBe(cursor);
    });

    it("rejects shifting below block zero", () => {
      expect(() => new Cursor(3, 2).shifted(4)).toThrow(RangeError);
    });
  });

  it("within moves inside the current block", () => {
    expect(new Cursor(1, 1).within(2)).toEqual(new Cursor(1, 3));
  });

  it("formats as block and offset", () => {
    expect(new Cursor(1, 3).toString()).toBe("Cursor(1, 3)");
  });
});

import { describe, expect, it } from "vitest";
import { POSTS_PER_PAGE, parsePageNumber, resolvePageWindow } from "../src/blog/pagination";

describe("parsePageNumber", () => {
  it("accepts integer strings and uses the last repeated value", () => {
    expect(parsePageNumber("3")).toBe(3);
    expect(parsePageNumber(" 2 ")).toBe(2);
    expect(parsePageNumber("-1")).toBe(-1);
    expect(parsePageNumber(["1", "4"])).toBe(4);
  });

  it("rejects everything else", () => {
    expect(parsePageNumber(undefined)).toBeUndefined();
    expect(parsePageNumber("")).toBeUndefined();
    expect(parsePageNumber("2.5")).toBeUndefined();
    expect(parsePageNumber("last")).toBeUndefined();
    expect(parsePageNumber({ page: "1" })).toBeUndefined();
  });
});

describe("resolvePageWindow", () => {
  it("pages by ten", () => {
    expect(POSTS_PER_PAGE).toBe(10);
    expect(resolvePageWindow(25, "2")).toEqual({
      number: 2,
      numPages: 3,
      totalCount: 25,
      limit: 10,
      offset: 10,
      previousPageNumber: 1,
      nextPageNumber: 3
    });
  });

  it("keeps a single empty page for an empty listing", () => {
    expect(resolvePageWindow(0, "5")).toEqual({
      number: 1,
      numPages: 1,
      totalCount: 0,
      limit: 10,
      offset: 0,
      previousPageNumber: null,
      nextPageNumber: null
    });
  });

  it("falls back to the first page for missing or malformed input", () => {
    expect(resolvePageWindow(25, undefined).number).toBe(1);
    expect(resolvePageWindow(25, "abc").number).toBe(1);
  });

  it("clamps out-of-range numbers to the last page", () => {
    expect(resolvePageWindow(25, "0").number).toBe(3);
    expect(resolvePageWindow(25, "-4").number).toBe(3);
    expect(resolvePageWindow(25, "40")).toMatchObject({ number: 3, offset: 20, nextPageNumber: null });
  });
});

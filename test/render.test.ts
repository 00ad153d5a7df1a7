import { describe, expect, it } from "vitest";
import { createExcerpt } from "../src/blog/render";

describe("createExcerpt", () => {
  it("keeps short text whole, counting characters", () => {
    const text = "😀".repeat(220);

    expect(createExcerpt(text)).toBe(text);
  });

  it("cuts between characters, never inside a surrogate pair", () => {
    const excerpt = createExcerpt(`${"a".repeat(218)}${"😀".repeat(3)}`);

    expect(excerpt).toBe(`${"a".repeat(218)}😀…`);
    expect(excerpt).not.toMatch(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])/);
  });

  it("flattens markdown before cutting", () => {
    expect(createExcerpt("**Bold** and [a link](https://example.com)\n\nnext", 12)).toBe("Bold and a…");
  });
});

import { describe, expect, it } from "vitest";
import { renderMarkdownSafe } from "../src/security/markdown";

describe("renderMarkdownSafe", () => {
  it("blocks raw script tags while preserving markdown formatting", () => {
    const html = renderMarkdownSafe("<script>alert('xss')</script> **safe**");

    expect(html).not.toContain("<script>");
    expect(html).toContain("<strong>safe</strong>");
  });

  it("keeps single line breaks inside a paragraph", () => {
    expect(renderMarkdownSafe("first line\nsecond line")).toContain("first line<br />");
  });

  it("removes javascript links", () => {
    const html = renderMarkdownSafe("[click](javascript:alert(1))");

    expect(html).not.toContain("<a");
    expect(html).not.toContain("href=");
  });

  it("opens author links in a new tab without passing referrer or ranking", () => {
    const html = renderMarkdownSafe("[map](https://example.com/map)");

    expect(html).toContain('href="https://example.com/map"');
    expect(html).toContain('target="_blank"');
    expect(html).toContain('rel="noopener noreferrer nofollow"');
  });

  it("drops images and headings above h2", () => {
    const html = renderMarkdownSafe("# Title\n\n![boat](https://example.com/boat.png)");

    expect(html).not.toContain("<h1");
    expect(html).not.toContain("<img");
  });
});

import MarkdownIt from "markdown-it";
import sanitizeHtml from "sanitize-html";

const markdown = new MarkdownIt({
  html: false,
  linkify: true,
  breaks: true,
  typographer: false
});

const ALLOWED_TAGS = [
  "p",
  "br",
  "hr",
  "strong",
  "em",
  "ul",
  "ol",
  "li",
  "a",
  "code",
  "pre",
  "blockquote",
  "h2",
  "h3",
  "h4"
];

// Post bodies are author-supplied: raw HTML is never passed through and links
// always open outside the page.
export function renderMarkdownSafe(input: string): string {
  return sanitizeHtml(markdown.render(input), {
    allowedTags: ALLOWED_TAGS,
    allowedAttributes: {
      a: ["href", "title", "target", "rel"],
      code: ["class"]
    },
    allowedSchemes: ["http", "https", "mailto"],
    transformTags: {
      a: (tagName, attribs) => ({
        tagName,
        attribs: {
          href: attribs.href ?? "#",
          title: attribs.title ?? "",
          target: "_blank",
          rel: "noopener noreferrer nofollow"
        }
      })
    }
  });
}

const HEADING_RE = /^(#{1,6})\s+(.*)$/;
const BULLET_RE = /^[-*+]\s+(.*)$/;
const ORDERED_RE = /^\d+[.)]\s+(.*)$/;
const SAFE_LINK_RE = /^(https?:|mailto:|\/|#)/i;

interface ListBlock {
  tag: "ul" | "ol";
  items: string[];
}

export function escapeHtml(value: string): string {
  return String(value || "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Inline markup on already-escaped text: links, bold, italic, code. */
function renderInline(escaped: string): string {
  return escaped
    .replace(/`([^`]+)`/g, "<code>$1</code>")
    .replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, (_match: string, label: string, href: string) =>
      SAFE_LINK_RE.test(href) ? `<a href="${href}">${label}</a>` : label,
    )
    .replace(/\*\*([^*]+)\*\*/g, "<strong>$1</strong>")
    .replace(/__([^_]+)__/g, "<strong>$1</strong>")
    .replace(/\*([^*]+)\*/g, "<em>$1</em>");
}

/**
 * Markdown subset used by rewritten articles. Raw HTML in the source is
 * escaped, never passed through.
 */
export function markdownToHtml(markdown: string): string {
  const blocks: string[] = [];
  const open: { paragraph: string[]; list: ListBlock | null } = { paragraph: [], list: null };

  const flushParagraph = () => {
    if (open.paragraph.length) {
      blocks.push(`<p>${renderInline(escapeHtml(open.paragraph.join(" ")))}</p>`);
      open.paragraph = [];
    }
  };
  const flushList = () => {
    const { list } = open;
    if (list) {
      const items = list.items.map((item) => `<li>${renderInline(escapeHtml(item))}</li>`).join("");
      blocks.push(`<${list.tag}>${items}</${list.tag}>`);
      open.list = null;
    }
  };

  for (const rawLine of String(markdown || "").replace(/\r\n?/g, "\n").split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      flushParagraph();
      flushList();
      continue;
    }

    const heading = HEADING_RE.exec(line);
    if (heading) {
      flushParagraph();
      flushList();
      const level = heading[1].length;
      blocks.push(`<h${level}>${renderInline(escapeHtml(heading[2].trim()))}</h${level}>`);
      continue;
    }

    const bullet = BULLET_RE.exec(line);
    const ordered = bullet ? null : ORDERED_RE.exec(line);
    const item = bullet ?? ordered;
    if (item) {
      flushParagraph();
      const tag = bullet ? "ul" : "ol";
      const current = open.list;
      if (current && current.tag === tag) {
        current.items.push(item[1]);
      } else {
        flushList();
        open.list = { tag, items: [item[1]] };
      }
      continue;
    }

    flushList();
    open.paragraph.push(line);
  }
  flushParagraph();
  flushList();

  return blocks.join("\n");
}

import { MarkupToken } from "./types";

// Sticky patterns, matched at the current scan position only
const OPEN_TAG_RE = /<([A-Za-z_][\w:.-]*)((?:\s+[^\s"'>/=]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'=<>`]+))?)*)\s*(\/?)>/y;
const CLOSE_TAG_RE = /<\/([A-Za-z_][\w:.-]*)\s*>/y;

// Elements whose body is not markup in HTML; scanned up to their close tag
const RAW_TEXT_ELEMENTS = new Set(["script", "style"]);

interface Delimited {
  open: string;
  close: string;
  type: "comment" | "cdata" | "instruction" | "declaration";
}

// Order matters: "<!--" and "<![CDATA[" before the generic "<!"
const DELIMITED: Delimited[] = [
  { open: "<!--", close: "-->", type: "comment" },
  { open: "<![CDATA[", close: "]]>", type: "cdata" },
  { open: "<?", close: "?>", type: "instruction" },
  { open: "<!", close: ">", type: "declaration" },
];

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function nextTagStart(markup: string, from: number): number {
  const index = markup.indexOf("<", from);
  return index === -1 ? markup.length : index;
}

/**
 * Splits markup into tag, text and other events. Concatenating the `raw`
 * field of every token reproduces the input exactly. Never throws: a `<`
 * that does not start a recognisable construct becomes a one-character
 * `malformed` token.
 */
export function tokenizeMarkup(markup: string): MarkupToken[] {
  const tokens: MarkupToken[] = [];
  let pos = 0;

  while (pos < markup.length) {
    if (markup[pos] !== "<") {
      const end = nextTagStart(markup, pos);
      tokens.push({ type: "text", raw: markup.slice(pos, end), start: pos });
      pos = end;
      continue;
    }

    const delimited = DELIMITED.find(d => markup.startsWith(d.open, pos));
    if (delimited) {
      const closeAt = markup.indexOf(delimited.close, pos + delimited.open.length);
      if (closeAt === -1) {
        tokens.push({
          type: "malformed",
          raw: markup.slice(pos),
          start: pos,
          reason: `unterminated ${delimited.type}`,
        });
        break;
      }
      const end = closeAt + delimited.close.length;
      tokens.push({ type: delimited.type, raw: markup.slice(pos, end), start: pos });
      pos = end;
      continue;
    }

    CLOSE_TAG_RE.lastIndex = pos;
    const close = CLOSE_TAG_RE.exec(markup);
    if (close) {
      tokens.push({ type: "closeTag", raw: close[0], start: pos, name: close[1] ?? "" });
      pos += close[0].length;
      continue;
    }

    OPEN_TAG_RE.lastIndex = pos;
    const open = OPEN_TAG_RE.exec(markup);
    if (open) {
      const name = open[1] ?? "";
      const selfClosing = open[3] === "/";
      tokens.push({ type: "openTag", raw: open[0], start: pos, name, selfClosing });
      pos += open[0].length;

      if (!selfClosing && RAW_TEXT_ELEMENTS.has(name.toLowerCase())) {
        pos = consumeRawText(markup, pos, name, tokens);
      }
      continue;
    }

    // Only the "<" itself is bad; what follows is scanned again as text
    tokens.push({ type: "malformed", raw: "<", start: pos, reason: "unrecognised tag" });
    pos++;
  }

  return tokens;
}

function consumeRawText(markup: string, pos: number, name: string, tokens: MarkupToken[]): number {
  const closeRe = new RegExp(`</${escapeRegex(name)}\\s*>`, "ig");
  closeRe.lastIndex = pos;
  const close = closeRe.exec(markup);
  const bodyEnd = close ? close.index : markup.length;

  if (bodyEnd > pos) {
    tokens.push({ type: "rawText", raw: markup.slice(pos, bodyEnd), start: pos, name });
  }
  if (!close) {
    tokens.push({ type: "malformed", raw: "", start: bodyEnd, reason: `unclosed <${name}>` });
    return markup.length;
  }
  tokens.push({ type: "closeTag", raw: close[0], start: bodyEnd, name });
  return bodyEnd + close[0].length;
}

import { describe, expect, it } from "vitest";
import { tokenizeMarkup } from "./markupTokenizer";

const summary = (markup: string) => tokenizeMarkup(markup).map(t => [t.type, t.raw]);

describe("tokenizeMarkup", () => {
  it("reproduces the input when tokens are joined", () => {
    const markup = [
      '<?xml version="1.0" encoding="utf-8"?>',
      "<!DOCTYPE html>",
      '<html xmlns="http://www.w3.org/1999/xhtml">',
      "<!-- generated -->",
      '<body><p class="first" data-x=\'1\'>Hi &amp; bye<br/></p>',
      "<script><![CDATA[ if (a < b) {} ]]></script>",
      "</body></html>",
    ].join("\n");
    expect(tokenizeMarkup(markup).map(t => t.raw).join("")).toBe(markup);
  });

  it("separates tags from text", () => {
    expect(summary('<p class="a">Hi &amp; bye<br/></p>')).toEqual([
      ["openTag", '<p class="a">'],
      ["text", "Hi &amp; bye"],
      ["openTag", "<br/>"],
      ["closeTag", "</p>"],
    ]);
  });

  it("marks self-closing tags", () => {
    const [br] = tokenizeMarkup("<br />");
    expect(br).toEqual({ type: "openTag", raw: "<br />", start: 0, name: "br", selfClosing: true });
  });

  it("keeps a > inside quoted attribute values", () => {
    expect(summary('<a title="x>y">z</a>')).toEqual([
      ["openTag", '<a title="x>y">'],
      ["text", "z"],
      ["closeTag", "</a>"],
    ]);
  });

  it("reads script bodies as raw text", () => {
    expect(summary("<script>if (a<b) x();</script><p>t</p>")).toEqual([
      ["openTag", "<script>"],
      ["rawText", "if (a<b) x();"],
      ["closeTag", "</script>"],
      ["openTag", "<p>"],
      ["text", "t"],
      ["closeTag", "</p>"],
    ]);
  });

  it("recognises comments, CDATA, processing instructions and declarations", () => {
    expect(summary('<?xml version="1.0"?><!DOCTYPE html><!-- a<b --><![CDATA[x<y]]>').map(([type]) => type)).toEqual([
      "instruction",
      "declaration",
      "comment",
      "cdata",
    ]);
  });

  it("emits a stray < as a malformed token and keeps scanning text", () => {
    const tokens = tokenizeMarkup("<p>a < b</p>");
    expect(tokens.map(t => [t.type, t.raw])).toEqual([
      ["openTag", "<p>"],
      ["text", "a "],
      ["malformed", "<"],
      ["text", " b"],
      ["closeTag", "</p>"],
    ]);
    expect(tokens[2]).toMatchObject({ start: 5, reason: "unrecognised tag" });
  });

  it("emits an unterminated comment as malformed", () => {
    const tokens = tokenizeMarkup("<p>x<!-- oops");
    expect(tokens[2]).toEqual({ type: "malformed", raw: "<!-- oops", start: 4, reason: "unterminated comment" });
  });

  it("returns no tokens for empty input", () => {
    expect(tokenizeMarkup("")).toEqual([]);
  });
});

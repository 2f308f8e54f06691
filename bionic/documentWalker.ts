import { XMLValidator } from "fast-xml-parser";
import { emboldenRun, leadingWordLength } from "./emboldener";
import { UnsupportedEncodingError, describeError } from "./errors";
import { tokenizeMarkup } from "./markupTokenizer";
import { localTagName, resolveOptions } from "./options";
import { XHTML_MEDIA_TYPE } from "./packageDiscovery";
import {
  DocumentIssue,
  DocumentOutcome,
  Logger,
  PackageEntry,
  ResolvedOptions,
  WalkResult,
} from "./types";

// Named and numeric character references, kept as opaque non-word tokens
const ENTITY_RE = /&(?:#[0-9]+|#[xX][0-9a-fA-F]+|[A-Za-z][A-Za-z0-9]*);/g;

const SUPPORTED_ENCODINGS = new Set(["utf-8", "utf8", "us-ascii", "ascii"]);
const XML_DECLARATION_RE = /^\s*<\?xml[^>]*?\bencoding\s*=\s*["']([^"']+)["']/i;
const META_CHARSET_RE = /<meta\b[^>]*?\bcharset\s*=\s*["']?([\w.:-]+)/i;
// Control characters never found in text documents
const BINARY_RE = /[\x00-\x08\x0E-\x1A]/;

const DEFAULT_RESOLVED = resolveOptions();

/**
 * Line numbers for increasing offsets. Each character is scanned once over
 * the life of the counter.
 */
function createLineCounter(markup: string): (offset: number) => number {
  let line = 1;
  let scanned = 0;
  return offset => {
    for (; scanned < offset && scanned < markup.length; scanned++) {
      if (markup.charCodeAt(scanned) === 10) line++;
    }
    return line;
  };
}

/**
 * Emboldens one text run, leaving entity references untouched. When the run
 * directly follows the close of an emphasis element its first word fragment
 * belongs to an already emboldened word and is copied as is.
 */
function transformText(raw: string, options: ResolvedOptions, continuesEmphasis: boolean): string {
  let output = "";
  let last = 0;

  if (continuesEmphasis) {
    last = leadingWordLength(raw, options.wordBoundaryPolicy);
    output = raw.slice(0, last);
  }

  ENTITY_RE.lastIndex = last;
  let match: RegExpExecArray | null;
  // eslint-disable-next-line no-cond-assign
  while ((match = ENTITY_RE.exec(raw)) !== null) {
    output += emboldenRun(raw.slice(last, match.index), options) + match[0];
    last = match.index + match[0].length;
  }
  return output + emboldenRun(raw.slice(last), options);
}

/**
 * Rewrites the character data of a markup document. Tags, comments, CDATA
 * sections and entity references are copied byte for byte; text inside any
 * excluded element is copied verbatim.
 */
export function walkDocument(
  markup: string,
  options: ResolvedOptions = DEFAULT_RESOLVED,
  logger: Logger = console,
): WalkResult {
  const issues: DocumentIssue[] = [];
  const stats = { textRuns: 0, emboldenedRuns: 0, excludedRuns: 0 };
  if (!markup) {
    return { output: markup, issues, stats };
  }

  // Open count per excluded tag name; text is eligible only while all are zero
  const exclusionDepth = new Map<string, number>();
  let excluded = 0;
  let afterEmphasis = false;
  const parts: string[] = [];
  const lineAt = createLineCounter(markup);

  for (const token of tokenizeMarkup(markup)) {
    switch (token.type) {
      case "openTag": {
        const name = localTagName(token.name);
        if (!token.selfClosing && options.excludedTags.has(name)) {
          exclusionDepth.set(name, (exclusionDepth.get(name) ?? 0) + 1);
          excluded++;
        }
        parts.push(token.raw);
        afterEmphasis = false;
        break;
      }
      case "closeTag": {
        const name = localTagName(token.name);
        const depth = exclusionDepth.get(name) ?? 0;
        if (depth > 0) {
          exclusionDepth.set(name, depth - 1);
          excluded--;
        }
        parts.push(token.raw);
        afterEmphasis = options.emphasisTags.has(name);
        break;
      }
      case "text": {
        stats.textRuns++;
        if (excluded > 0) {
          stats.excludedRuns++;
          parts.push(token.raw);
        } else {
          const rewritten = transformText(token.raw, options, afterEmphasis);
          if (rewritten !== token.raw) stats.emboldenedRuns++;
          parts.push(rewritten);
        }
        afterEmphasis = false;
        break;
      }
      case "malformed": {
        const line = lineAt(token.start);
        issues.push({ kind: "MalformedMarkup", offset: token.start, line, message: token.reason });
        logger.warn(`[documentWalker] Malformed markup at line ${line}: ${token.reason} (left unchanged)`);
        parts.push(token.raw);
        afterEmphasis = false;
        break;
      }
      default:
        parts.push(token.raw);
        afterEmphasis = false;
    }
  }

  return { output: parts.join(""), issues, stats };
}

export function transformDocument(
  markup: string,
  options: ResolvedOptions = DEFAULT_RESOLVED,
  logger: Logger = console,
): string {
  return walkDocument(markup, options, logger).output;
}

/**
 * Encoding declared by a document's BOM, XML declaration or meta charset.
 */
export function detectEncoding(data: Uint8Array): string {
  if (data[0] === 0xff && data[1] === 0xfe) return "utf-16le";
  if (data[0] === 0xfe && data[1] === 0xff) return "utf-16be";

  const bomLength = data[0] === 0xef && data[1] === 0xbb && data[2] === 0xbf ? 3 : 0;
  const head = new TextDecoder("latin1").decode(data.subarray(bomLength, bomLength + 1024));
  const declared = head.match(XML_DECLARATION_RE)?.[1] ?? head.match(META_CHARSET_RE)?.[1];
  return (declared ?? "utf-8").toLowerCase();
}

export function decodeMarkup(data: Uint8Array): string {
  const encoding = detectEncoding(data);
  if (!SUPPORTED_ENCODINGS.has(encoding)) {
    throw new UnsupportedEncodingError(encoding, `Unsupported document encoding: ${encoding}`);
  }
  try {
    // ignoreBOM keeps a leading BOM in the string so it is written back
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(data);
  } catch (error) {
    throw new UnsupportedEncodingError(encoding, `Invalid ${encoding} byte sequence: ${describeError(error)}`);
  }
}

/**
 * Transforms one package entry. Failures are returned, never thrown, so the
 * caller decides whether to pass the entry through or stop the conversion.
 */
export function transformEntry(
  entry: PackageEntry,
  data: Uint8Array,
  options: ResolvedOptions = DEFAULT_RESOLVED,
  logger: Logger = console,
): DocumentOutcome {
  let markup: string;
  try {
    markup = decodeMarkup(data);
  } catch (error) {
    if (!(error instanceof UnsupportedEncodingError)) throw error;
    return {
      status: "failed",
      failure: {
        kind: "UnsupportedEncoding",
        entryName: entry.name,
        mediaType: entry.mediaType,
        cause: error.message,
      },
    };
  }

  if (BINARY_RE.test(markup)) {
    return {
      status: "failed",
      failure: {
        kind: "MalformedMarkup",
        entryName: entry.name,
        mediaType: entry.mediaType,
        cause: "Entry contains binary data",
      },
    };
  }

  const result = walkDocument(markup, options, logger);

  if (entry.mediaType === XHTML_MEDIA_TYPE) {
    const validation = XMLValidator.validate(markup);
    if (validation !== true) {
      const { msg, line } = validation.err;
      result.issues.push({ kind: "MalformedMarkup", offset: 0, line, message: msg });
      logger.warn(`[documentWalker] ${entry.name} is not well-formed XHTML (line ${line}): ${msg}`);
    }
  }

  return {
    status: "transformed",
    data: result.output === markup ? data : new TextEncoder().encode(result.output),
    issues: result.issues,
    stats: result.stats,
  };
}

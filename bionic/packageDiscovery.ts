import { posix } from "path";
import { XMLParser } from "fast-xml-parser";
import { Logger, PackageEntry } from "./types";

export const XHTML_MEDIA_TYPE = "application/xhtml+xml";
export const HTML_MEDIA_TYPE = "text/html";
export const MARKUP_MEDIA_TYPES = new Set([XHTML_MEDIA_TYPE, HTML_MEDIA_TYPE]);

export const CONTAINER_PATH = "META-INF/container.xml";
const OPF_MEDIA_TYPE = "application/oebps-package+xml";

// Used for entries the manifest does not list
const EXTENSION_MEDIA_TYPES: Record<string, string> = {
  ".xhtml": XHTML_MEDIA_TYPE,
  ".html": HTML_MEDIA_TYPE,
  ".htm": HTML_MEDIA_TYPE,
  ".opf": OPF_MEDIA_TYPE,
  ".ncx": "application/x-dtbncx+xml",
  ".css": "text/css",
  ".xml": "application/xml",
};

export interface ArchiveListing {
  name: string;
  dir: boolean;
}

export type ReadEntryText = (name: string) => Promise<string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function child(node: unknown, key: string): unknown {
  return isRecord(node) ? node[key] : undefined;
}

function attribute(node: unknown, name: string): string | undefined {
  const value = child(node, `@_${name}`);
  return typeof value === "string" ? value : undefined;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseAttributeValue: false,
  isArray: (name) => name === "rootfile" || name === "item",
});

/**
 * Path of the package document (OPF) named by META-INF/container.xml.
 */
export function findPackageDocumentPath(containerXml: string): string | undefined {
  const container = parser.parse(containerXml);
  const rootfiles = asArray(child(child(child(container, "container"), "rootfiles"), "rootfile"));
  const rootfile = rootfiles.find(r => attribute(r, "media-type") === OPF_MEDIA_TYPE) ?? rootfiles[0];
  return attribute(rootfile, "full-path");
}

/**
 * Maps archive paths to the media types the OPF manifest declares for them.
 * Manifest hrefs are URL-encoded and relative to the OPF's directory.
 */
export function readManifest(opfXml: string, opfPath: string): Map<string, string> {
  const manifest = new Map<string, string>();
  const opf = parser.parse(opfXml);
  const items = asArray(child(child(child(opf, "package"), "manifest"), "item"));
  const baseDir = posix.dirname(opfPath);

  for (const item of items) {
    const href = attribute(item, "href");
    const mediaType = attribute(item, "media-type");
    if (!href || !mediaType) continue;

    let decoded: string;
    try {
      decoded = decodeURIComponent(href.split("#")[0] ?? "");
    } catch {
      decoded = href;
    }
    const path = posix.normalize(baseDir === "." ? decoded : posix.join(baseDir, decoded));
    manifest.set(path, mediaType.trim().toLowerCase());
  }
  return manifest;
}

export function mediaTypeFromExtension(name: string): string | undefined {
  return EXTENSION_MEDIA_TYPES[posix.extname(name).toLowerCase()];
}

/**
 * Classifies every archive entry, in archive order, as markup to transform
 * or content to pass through. The OPF manifest decides where it lists an
 * entry; otherwise the file extension does.
 */
export async function discoverPackage(
  listing: ArchiveListing[],
  readText: ReadEntryText,
  logger: Logger = console,
): Promise<PackageEntry[]> {
  let manifest = new Map<string, string>();

  const containerXml = await readText(CONTAINER_PATH);
  if (containerXml === undefined) {
    logger.warn(`[packageDiscovery] ${CONTAINER_PATH} not found, classifying entries by extension`);
  } else {
    const opfPath = findPackageDocumentPath(containerXml);
    const opfXml = opfPath ? await readText(opfPath) : undefined;
    if (opfPath && opfXml !== undefined) {
      manifest = readManifest(opfXml, opfPath);
      logger.log(`[packageDiscovery] Package document ${opfPath}: ${manifest.size} manifest items`);
    } else {
      logger.warn(`[packageDiscovery] Package document ${opfPath ?? "(none)"} not readable, classifying entries by extension`);
    }
  }

  return listing.map(({ name, dir }): PackageEntry => {
    if (dir) {
      return { name, dir, kind: "passthrough" };
    }
    const mediaType = manifest.get(name) ?? mediaTypeFromExtension(name);
    const kind = mediaType !== undefined && MARKUP_MEDIA_TYPES.has(mediaType) ? "markup" : "passthrough";
    return { name, dir, mediaType, kind };
  });
}

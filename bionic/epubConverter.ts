import * as fs from "fs";
import JSZip from "jszip";
import { transformEntry } from "./documentWalker";
import {
  ConversionAbortedError,
  InvalidPackageError,
  describeError,
} from "./errors";
import { resolveOptions } from "./options";
import { discoverPackage } from "./packageDiscovery";
import { ConversionReport, ConvertOptions, PackageEntry } from "./types";

export const EPUB_MIME_TYPE = "application/epub+zip";
const MIMETYPE_ENTRY = "mimetype";

export interface ConvertedPackage {
  buffer: Buffer;
  report: ConversionReport;
}

function checkAborted(signal: AbortSignal | undefined, entryName: string): void {
  if (signal?.aborted) {
    throw new ConversionAbortedError(`Conversion aborted before ${entryName}`);
  }
}

function fileOptions(entry: PackageEntry, source: JSZip.JSZipObject): JSZip.JSZipFileOptions {
  return {
    binary: true,
    createFolders: false,
    date: source.date,
    comment: source.comment,
    dosPermissions: source.dosPermissions,
    unixPermissions: source.unixPermissions,
    // EPUB readers expect the mimetype entry stored, not deflated
    compression: entry.name === MIMETYPE_ENTRY ? "STORE" : "DEFLATE",
  };
}

/**
 * Converts an EPUB held in memory. Entries are written back in archive order;
 * only markup documents change, every other entry keeps its bytes.
 */
export async function convertEpubBuffer(
  input: Uint8Array,
  options: ConvertOptions = {},
): Promise<ConvertedPackage> {
  const startedAt = Date.now();
  const logger = options.logger ?? console;
  const policy = options.onDocumentError ?? "skip";
  const resolved = resolveOptions(options);

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(input);
  } catch (zipError) {
    throw new InvalidPackageError(`Invalid EPUB file (not a valid ZIP archive): ${describeError(zipError)}`);
  }

  const sources: JSZip.JSZipObject[] = [];
  zip.forEach((_relativePath, file) => {
    sources.push(file);
  });

  let entries: PackageEntry[];
  try {
    entries = await discoverPackage(
      sources.map(file => ({ name: file.name, dir: file.dir })),
      async (name) => zip.file(name)?.async("string"),
      logger,
    );
  } catch (discoveryError) {
    throw new InvalidPackageError(`Could not read EPUB package structure: ${describeError(discoveryError)}`);
  }

  if (sources[0]?.name !== MIMETYPE_ENTRY) {
    logger.warn(`[epubConverter] "${MIMETYPE_ENTRY}" is not the first entry; entry order is kept as is`);
  }

  const report: ConversionReport = {
    entries: entries.length,
    transformed: 0,
    passedThrough: 0,
    failures: [],
    issues: [],
    elapsedMs: 0,
  };
  const output = new JSZip();

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const source = sources[i];
    if (!entry || !source) continue;
    checkAborted(options.signal, entry.name);

    if (entry.dir) {
      output.file(entry.name, null, { ...fileOptions(entry, source), dir: true });
      report.passedThrough++;
    } else {
      const data = await source.async("uint8array");
      let written = data;

      if (entry.kind === "markup") {
        const outcome = transformEntry(entry, data, resolved, logger);
        if (outcome.status === "transformed") {
          written = outcome.data;
          report.transformed++;
          for (const issue of outcome.issues) {
            report.issues.push({ entryName: entry.name, issue });
          }
        } else {
          const { failure } = outcome;
          report.failures.push(failure);
          if (policy === "abort") {
            throw new ConversionAbortedError(`${failure.kind} in ${failure.entryName}: ${failure.cause}`);
          }
          logger.warn(`[epubConverter] ${failure.kind} in ${failure.entryName}, copied unchanged: ${failure.cause}`);
          report.passedThrough++;
        }
      } else {
        report.passedThrough++;
      }

      output.file(entry.name, written, fileOptions(entry, source));
    }

    options.onProgress?.({
      index: i + 1,
      total: entries.length,
      entryName: entry.name,
      percent: Math.floor(((i + 1) / entries.length) * 100),
    });
  }

  let buffer: Buffer;
  try {
    buffer = await output.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
      compressionOptions: { level: 6 },
      mimeType: EPUB_MIME_TYPE,
    });
  } catch (generateError) {
    throw new Error(`Failed to generate converted EPUB: ${describeError(generateError)}`);
  }

  report.elapsedMs = Date.now() - startedAt;
  logger.log(
    `[epubConverter] ${report.transformed} documents transformed, ${report.passedThrough} entries copied, ` +
      `${report.failures.length} failures (${report.elapsedMs} ms)`,
  );
  return { buffer, report };
}

/**
 * Converts the EPUB at `inputPath` and writes the result to `outputPath`.
 */
export async function convertEpub(
  inputPath: string,
  outputPath: string,
  options: ConvertOptions = {},
): Promise<ConversionReport> {
  if (!fs.existsSync(inputPath)) {
    throw new InvalidPackageError(`Input file not found: ${inputPath}`);
  }
  const input = fs.readFileSync(inputPath);
  const { buffer, report } = await convertEpubBuffer(input, options);
  fs.writeFileSync(outputPath, buffer);
  return report;
}

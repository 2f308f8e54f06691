import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram, defaultOutputPath, formatProgress, runCli } from "./cli";

async function writeSampleEpub(filePath: string): Promise<void> {
  const zip = new JSZip();
  zip.file("mimetype", "application/epub+zip", { compression: "STORE", createFolders: false });
  zip.file("OEBPS/ch1.xhtml", "<html><body><p>Hello world</p></body></html>", { createFolders: false });
  fs.writeFileSync(filePath, await zip.generateAsync({ type: "nodebuffer" }));
}

describe("defaultOutputPath", () => {
  it("adds a _bionic suffix next to the input", () => {
    expect(defaultOutputPath(path.join("books", "novel.epub"))).toBe(path.join("books", "novel_bionic.epub"));
  });

  it("uses .epub when the input has no extension", () => {
    expect(defaultOutputPath("novel")).toBe("novel_bionic.epub");
  });
});

describe("formatProgress", () => {
  it("shows percent, position and entry name", () => {
    expect(formatProgress({ index: 3, total: 12, entryName: "OEBPS/Text/chapter-003.xhtml", percent: 25 })).toBe(
      "[ 25%] 3/12 OEBPS/Text/chapter-003.xhtml",
    );
  });

  it("shortens long entry names from the left", () => {
    expect(
      formatProgress({ index: 12, total: 12, entryName: "OEBPS/Text/a-very-long-chapter-file-name.xhtml", percent: 100 }),
    ).toBe("[100%] 12/12 ...ong-chapter-file-name.xhtml");
  });
});

describe("runCli", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "bionic-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("converts a book to the default output path", async () => {
    const input = path.join(workDir, "book.epub");
    await writeSampleEpub(input);

    const code = await runCli(input, undefined, { onError: "skip", quiet: true });

    expect(code).toBe(0);
    const zip = await JSZip.loadAsync(fs.readFileSync(path.join(workDir, "book_bionic.epub")));
    expect(await zip.file("OEBPS/ch1.xhtml")?.async("string")).toBe(
      "<html><body><p><b>He</b>llo <b>wo</b>rld</p></body></html>",
    );
    expect(console.log).toHaveBeenCalledWith(`Successfully converted to: ${path.join(workDir, "book_bionic.epub")}`);
  });

  it("fails for a missing input file", async () => {
    const input = path.join(workDir, "missing.epub");
    expect(await runCli(input, undefined, { onError: "skip" })).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`Error: Input file '${input}' does not exist.`);
  });

  it("refuses to overwrite the input", async () => {
    const input = path.join(workDir, "book.epub");
    await writeSampleEpub(input);
    expect(await runCli(input, input, { onError: "skip", quiet: true })).toBe(1);
  });

  it("fails on invalid options", async () => {
    const input = path.join(workDir, "book.epub");
    await writeSampleEpub(input);
    expect(await runCli(input, undefined, { onError: "retry", quiet: true })).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error during conversion: --on-error must be "skip" or "abort", got "retry"');
  });
});

describe("createProgram", () => {
  it("declares the input and output arguments", () => {
    const program = createProgram();
    expect(program.name()).toBe("bionic-epub");
    expect(program.registeredArguments.map(arg => arg.name())).toEqual(["input", "output"]);
  });
});

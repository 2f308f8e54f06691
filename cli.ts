#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import {
  ConversionProgress,
  DocumentErrorPolicy,
  InvalidOptionsError,
  Logger,
  convertEpub,
  describeError,
  parseOptionFields,
} from "./bionic";

interface CliOptions {
  fraction?: string;
  exclude?: string;
  hyphens?: string;
  apostrophes?: string;
  emphasisTag?: string;
  onError: string;
  quiet?: boolean;
}

export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_bionic${parsed.ext || ".epub"}`);
}

export function formatProgress(progress: ConversionProgress): string {
  const name = progress.entryName.length > 30 ? `...${progress.entryName.slice(-27)}` : progress.entryName;
  return `[${String(progress.percent).padStart(3, " ")}%] ${progress.index}/${progress.total} ${name}`;
}

function parseErrorPolicy(value: string): DocumentErrorPolicy {
  if (value === "skip" || value === "abort") return value;
  throw new InvalidOptionsError(`--on-error must be "skip" or "abort", got "${value}"`);
}

const quietLogger: Logger = {
  log: () => undefined,
  warn: console.warn,
  error: console.error,
};

export async function runCli(input: string, output: string | undefined, opts: CliOptions): Promise<number> {
  const outputPath = output ?? defaultOutputPath(input);

  if (!fs.existsSync(input)) {
    console.error(`Error: Input file '${input}' does not exist.`);
    return 1;
  }
  if (path.resolve(input) === path.resolve(outputPath)) {
    console.error("Error: Output path must differ from the input path.");
    return 1;
  }
  if (fs.existsSync(outputPath)) {
    console.warn(`Warning: Output file '${outputPath}' will be overwritten.`);
  }

  try {
    const bionicOptions = parseOptionFields(opts);
    const report = await convertEpub(input, outputPath, {
      ...bionicOptions,
      onDocumentError: parseErrorPolicy(opts.onError),
      logger: opts.quiet ? quietLogger : console,
      onProgress: opts.quiet
        ? undefined
        : (progress) => {
            process.stdout.write(`\r${formatProgress(progress).padEnd(60, " ")}`);
            if (progress.index === progress.total) process.stdout.write("\n");
          },
    });

    for (const failure of report.failures) {
      console.warn(`Skipped ${failure.entryName}: ${failure.cause}`);
    }
    console.log(`Successfully converted to: ${outputPath}`);
    return 0;
  } catch (error) {
    if (!opts.quiet) process.stdout.write("\n");
    console.error(`Error during conversion: ${describeError(error)}`);
    return 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("bionic-epub")
    .description("Convert an EPUB to Bionic Reading format")
    .version("1.0.0")
    .argument("<input>", "Input EPUB file path")
    .argument("[output]", "Output EPUB file path (default: <input>_bionic.epub)")
    .option("-f, --fraction <number>", "Bold fraction for words of 10 or more letters (default: 0.5)")
    .option("-x, --exclude <tags>", "Comma-separated tags whose text is never changed")
    .option("--hyphens <mode>", "join or split words at hyphens (default: split)")
    .option("--apostrophes <mode>", "join or split words at apostrophes (default: join)")
    .option("--emphasis-tag <name>", "Tag wrapped around bold prefixes: b, strong, em or mark (default: b)")
    .option("--on-error <policy>", "skip or abort on documents that cannot be converted", "skip")
    .option("-q, --quiet", "Only print the final result")
    .action(async (input: string, output: string | undefined, opts: CliOptions) => {
      process.exitCode = await runCli(input, output, opts);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error("Error:", err);
      process.exit(1);
    });
}

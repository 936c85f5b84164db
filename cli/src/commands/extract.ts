import fs from "node:fs/promises";
import path from "node:path";
import type { Command } from "commander";
import { processFiles } from "meeting-notes-core";
import type { ExtractionResult } from "meeting-notes-core";
import { getMaxFiles } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { expandInputs, outputPathFor, parsePositiveInt } from "../lib/utils.js";

interface ExtractOptions {
  out?: string;
  maxFiles?: string;
}

function logWarnings(result: ExtractionResult): void {
  const { warnings, record } = result;
  if (!warnings.length) return;
  logger.info(`[meeting-notes] ${record.source}: ${warnings.length} parse warning(s)`);
  for (const warning of warnings) {
    const where = warning.lineNumber !== undefined ? `line ${warning.lineNumber}: ` : "";
    logger.debug(`  ${where}[${warning.code}] ${warning.message}`);
  }
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
}

export async function cmdExtract(inputs: string[], options: ExtractOptions): Promise<void> {
  const maxFiles = options.maxFiles !== undefined ? parsePositiveInt(options.maxFiles) : getMaxFiles();
  if (maxFiles === undefined) {
    logger.error(`Error: --maxFiles must be a positive integer, got "${options.maxFiles}"`);
    process.exit(2);
  }
  if (!inputs.length) {
    logger.error("Error: at least one input file or directory is required");
    process.exit(2);
  }

  const out = options.out;
  const singleFileOut = out !== undefined && path.extname(out).toLowerCase() === ".json";
  if (out === undefined) {
    // stdout carries the records
    logger.setOptions({ stderr: true });
  }

  const { files, truncated } = await expandInputs(inputs, maxFiles);
  if (truncated) {
    logger.warn(`[meeting-notes] Warning: Reached file limit of ${maxFiles}, some files may be skipped (use --maxFiles to adjust)`);
  }
  if (!files.length) {
    logger.error("Error: no .txt or .md files found in the given inputs");
    process.exit(2);
  }
  if (singleFileOut && files.length > 1) {
    logger.error(`Error: --out ${out} names a single file but ${files.length} inputs were given; pass a directory instead`);
    process.exit(2);
  }
  if (out !== undefined && !singleFileOut) {
    const targets = new Map<string, string>();
    for (const file of files) {
      const target = outputPathFor(out, file);
      const previous = targets.get(target);
      if (previous !== undefined) {
        logger.error(`Error: ${previous} and ${file} would both be written to ${target}`);
        process.exit(2);
      }
      targets.set(target, file);
    }
  }

  const { results, failures } = await processFiles(files);

  for (const failure of failures) {
    logger.error(`✗ Failed to extract ${failure.source}: ${failure.error.message}`);
  }

  for (const result of results) {
    logWarnings(result);
    const { record } = result;
    if (out === undefined) {
      console.log(JSON.stringify(record));
    } else if (singleFileOut) {
      await writeJson(out, record);
      logger.info(`✓ ${record.source} → ${out}`);
    } else {
      const target = outputPathFor(out, record.source);
      await writeJson(target, record);
      logger.info(`✓ ${record.source} → ${target}`);
    }
  }

  logger.info(`[meeting-notes] Done. Extracted ${results.length} of ${files.length} documents.`);

  if (!results.length) {
    process.exit(1);
  }
}

export function registerExtractCommand(program: Command): void {
  program
    .command("extract")
    .description("Extract structured meeting records from notes files")
    .argument("<inputs...>", "Notes files or directories")
    .option("--out <path>", "Output directory (one JSON file per input) or a single .json file")
    .option("--maxFiles <n>", "Maximum files to read from directories (env MEETING_NOTES_MAX_FILES, default 4000)")
    .action(cmdExtract);
}

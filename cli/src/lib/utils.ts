import fs from "node:fs/promises";
import path from "node:path";

export const SUPPORTED_NOTES_EXTS = new Set([".txt", ".md", ".markdown"]);

export function isNotesFile(filePath: string): boolean {
  return SUPPORTED_NOTES_EXTS.has(path.extname(filePath).toLowerCase());
}

/** Strict parse of a CLI count such as `--maxFiles 20`. */
export function parsePositiveInt(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) return undefined;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

export async function listFiles(root: string, maxFiles?: number): Promise<string[]> {
  const out: string[] = [];
  const stack = [root];
  const ignore = new Set([".git", "node_modules", "dist", "build", "target", ".next", ".cache", "vendor"]);
  let dir = stack.pop();
  while (dir !== undefined) {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const e of entries) {
      if (ignore.has(e.name)) continue;
      const full = path.join(dir, e.name);
      if (e.isDirectory()) stack.push(full);
      else if (e.isFile() && isNotesFile(full)) {
        out.push(full);
        if (maxFiles !== undefined && out.length >= maxFiles) {
          return out;
        }
      }
    }
    dir = stack.pop();
  }
  return out;
}

export interface ExpandedInputs {
  files: string[];
  /** True when a directory walk stopped at maxFiles. */
  truncated: boolean;
}

/**
 * Resolve CLI inputs to note files. Files are taken as given; directories
 * are walked for notes files, sorted, up to `maxFiles` in total.
 */
export async function expandInputs(inputs: string[], maxFiles: number): Promise<ExpandedInputs> {
  const files: string[] = [];
  let truncated = false;

  for (const input of inputs) {
    if (files.length >= maxFiles) {
      truncated = true;
      break;
    }
    // unreadable paths are passed on and reported by the reader
    const stat = await fs.stat(input).catch(() => undefined);
    if (!stat?.isDirectory()) {
      files.push(input);
      continue;
    }
    const remaining = maxFiles - files.length;
    // one past the limit tells a full directory from a larger one
    const found = (await listFiles(input, remaining + 1)).sort();
    if (found.length > remaining) truncated = true;
    files.push(...found.slice(0, remaining));
  }

  return { files, truncated };
}

/** `<dir>/<basename>.json` for one input document. */
export function outputPathFor(outDir: string, source: string): string {
  const base = path.basename(source, path.extname(source));
  return path.join(outDir, `${base}.json`);
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { processFiles } from "./batch.js";
import { ExtractionError, ReadError } from "./errors.js";

describe("processFiles", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "meeting-notes-batch-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await fs.writeFile(filePath, content, "utf-8");
    return filePath;
  }

  it("should extract each file and keep input order", async () => {
    const a = await write("a.txt", "Standup A\nDate: 2024-03-01\n");
    const b = await write("b.txt", "Standup B\nDate: 2024-03-02\n");

    const { results, failures } = await processFiles([a, b]);

    expect(failures).toEqual([]);
    expect(results.map((r) => r.record.title)).toEqual(["Standup A", "Standup B"]);
  });

  it("should report failed documents by identifier and continue", async () => {
    const good = await write("good.txt", "Standup\nDate: 2024-03-01\n");
    const empty = await write("empty.txt", "");
    const undated = await write("undated.txt", "Standup\nNo date here\n");
    const missing = path.join(tmpDir, "missing.txt");

    const { results, failures } = await processFiles([good, empty, undated, missing]);

    expect(results.map((r) => r.record.source)).toEqual([good]);
    expect(failures.map((f) => f.source)).toEqual([empty, undated, missing]);
    expect(failures[0].error).toBeInstanceOf(ReadError);
    expect(failures[1].error).toBeInstanceOf(ExtractionError);
    expect(failures[2].error).toBeInstanceOf(ReadError);
  });

  it("should return empty results for no input", async () => {
    expect(await processFiles([])).toEqual({ results: [], failures: [] });
  });
});

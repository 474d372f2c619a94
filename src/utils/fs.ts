/**
 * File System Utilities
 * JSON artifact I/O and output housekeeping for the pipeline
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Outcome of an output cleanup pass
 */
export interface CleanupResult {
  totalDeleted: number;
  deletedFiles: string[];
  errors: string[];
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Synchronous file exists check
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Read and parse a JSON file. Parse and read errors propagate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fsPromises.readFile(filePath, { encoding: "utf-8" });
  return JSON.parse(content) as unknown;
}

/**
 * Serialize data as indented JSON, creating parent directories if needed
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

/**
 * Find files matching glob patterns
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = true } = options;

  return fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore,
    dot: false,
  });
}

/**
 * Delete files under `directory` matching `patterns` whose modification time
 * is older than `retentionDays`.
 */
export async function cleanupOutputDirectory(
  directory: string,
  retentionDays: number,
  patterns: string[],
  now: Date = new Date()
): Promise<CleanupResult> {
  const result: CleanupResult = { totalDeleted: 0, deletedFiles: [], errors: [] };

  if (!(await fileExists(directory)) || patterns.length === 0) {
    return result;
  }

  const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;
  const candidates = await findFiles({ patterns, cwd: directory, absolute: true });

  for (const filePath of candidates.sort()) {
    try {
      const stats = await fsPromises.stat(filePath);
      if (stats.mtime.getTime() < cutoff) {
        await fsPromises.unlink(filePath);
        result.deletedFiles.push(path.relative(directory, filePath));
        result.totalDeleted++;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.errors.push(`${path.relative(directory, filePath)}: ${message}`);
    }
  }

  return result;
}

/**
 * Helpers shared by the CLI commands
 */

import { InvalidArgumentError } from "commander";
import { InputShapeError, ErrorCode, wrapError } from "../../core/errors.js";
import { fileExists, readJsonFile } from "../../utils/fs.js";

/**
 * commander argument parser for `--threshold`
 */
export function parseThreshold(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Threshold must be a non-negative number.");
  }
  return parsed;
}

/**
 * Read a JSON document named on the command line.
 */
export async function readJsonArgument(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) {
    throw new InputShapeError(`File not found: ${filePath}`, ErrorCode.INPUT_FILE_NOT_FOUND, { filePath });
  }
  try {
    return await readJsonFile(filePath);
  } catch (error) {
    throw wrapError(error, `Cannot read ${filePath}`, ErrorCode.FILE_SYSTEM_ERROR);
  }
}

/**
 * Format duration in human readable format
 */
export function formatDuration(milliseconds: number): string {
  const seconds = milliseconds / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
}

export function rule(): string {
  return "─".repeat(40);
}

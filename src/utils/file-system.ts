/**
 * File system helpers used by the config loader, model files and the CLI.
 */
import * as fs from 'node:fs';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON file.
 */
export async function readJson(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${filePath}`, { filePath });
  }
  const content = await readFile(filePath);
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse JSON: ${error instanceof Error ? error.message : 'Unknown error'} (file: ${filePath})`,
      { filePath }
    );
  }
}

/**
 * File system reads used by the CLI and the config loader.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes, leaving decoding to the caller.
 * Source documents are read this way so that invalid UTF-8 is rejected
 * by the engine instead of being silently replaced.
 */
export async function readFileBytes(filePath: string): Promise<Uint8Array> {
  try {
    const buffer = await fs.promises.readFile(filePath);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_READ_ERROR,
      `Failed to read file: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Normalize and resolve a path relative to a base.
 */
export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}

import fs from 'fs';
import path from 'path';

import { getErrorMessage } from './errors';
import { ErrorWithCode, EXIT_INVALID_ARGS } from './exit-codes';

const FILE_ENCODING_UTF8 = 'utf-8';

/**
 * Reads `record[key]` only when it is the record's own property, so names such
 * as `toString` or `constructor` never resolve to `Object.prototype` members.
 */
export function getOwn<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Creates a validation error with a custom error code.
 *
 * @param message - The error message to associate with the error.
 * @param code - The numeric error code indicating the exit or validation type.
 * @returns An Error object with the specified message and an added 'code' property.
 */
export function createValidationError(message: string, code: number): ErrorWithCode {
  const err: ErrorWithCode = new Error(message);
  err.code = code;
  return err;
}

/**
 * Reads and parses a JSON file relative to the current working directory.
 * Throws a validation error (EXIT_INVALID_ARGS) if the path is missing, is not a
 * file, or does not hold valid JSON.
 *
 * @param filePath - The path to the JSON file, relative to the current working directory.
 * @param errorContext - Label for error messages (e.g. "Config file").
 * @returns The parsed JSON value; callers validate its shape.
 */
export function readJsonFile(filePath: string, errorContext: string = 'File'): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) {
    throw createValidationError(`${errorContext} not found: ${abs}`, EXIT_INVALID_ARGS);
  }
  const stat = fs.statSync(abs);
  if (!stat.isFile()) {
    throw createValidationError(`Path is not a file: ${abs}`, EXIT_INVALID_ARGS);
  }
  const raw = fs.readFileSync(abs, FILE_ENCODING_UTF8);
  try {
    return JSON.parse(raw) as unknown;
  } catch (parseError: unknown) {
    throw createValidationError(`Invalid JSON format in ${errorContext.toLowerCase()}: ${abs} (${getErrorMessage(parseError)})`, EXIT_INVALID_ARGS);
  }
}

/**
 * Writes content to a file, creating parent directories if needed.
 *
 * @param relativePath - The file path relative to the current working directory.
 * @param content - The content to write to the file.
 * @returns Promise resolving to the absolute path of the file that was written.
 */
export async function writeFileWithDirectories(relativePath: string, content: string): Promise<string> {
  const absolutePath = path.resolve(process.cwd(), relativePath);

  const parentDir = path.dirname(absolutePath);
  if (!fs.existsSync(parentDir)) {
    fs.mkdirSync(parentDir, { recursive: true });
  }

  await fs.promises.writeFile(absolutePath, content, FILE_ENCODING_UTF8);
  return absolutePath;
}

/**
 * Narrows an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively freezes a plain data structure and returns it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

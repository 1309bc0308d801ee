import fs from 'fs';
import path from 'path';

import dotenv from 'dotenv';

import { BACKEND_REGISTRY } from '../backends/backend-registry';
import { BACKEND_KINDS, BackendKind } from '../types/backend.types';

import { writeStderr } from './console';

const DEFAULT_ENV_FILENAME = '.env';
const ERROR_ENV_FILE_NOT_FOUND = 'Environment file not found';
const WARN_DEFAULT_ENV_MISSING = 'No .env file found at';
const ERROR_ENV_FILE_LOAD_FAILED = 'Failed to load environment file';

/**
 * What a .env file contributed to the backend credentials.
 */
export interface EnvFileReport {
  /** Absolute path of the file, or undefined when no file was read. */
  path?: string;
  /** Backends whose API key now comes from the file. */
  suppliedBackends: BackendKind[];
  /** Backends whose key is in the file but was already set in the environment, which wins. */
  shadowedBackends: BackendKind[];
}

function describeReport(report: EnvFileReport): string {
  const supplied = report.suppliedBackends.length > 0 ? report.suppliedBackends.join(', ') : 'none';
  let line = `Loaded ${report.path}: API keys for ${supplied}`;
  if (report.shadowedBackends.length > 0) {
    line += `; already set in the environment: ${report.shadowedBackends.join(', ')}`;
  }
  return `${line}\n`;
}

/**
 * Loads environment variables (backend API keys, Langfuse keys) from a .env file
 * and reports which backend credentials it supplied.
 *
 * A missing default `.env` is skipped (with a stderr note in verbose mode); a
 * missing explicitly named file is an error. Variables already present in the
 * environment are not overwritten. Empty keys in the file count as absent.
 *
 * @param envFilePath - Optional path to a custom .env file, relative to the invocation directory
 * @param verbose - Whether to write the report (or the missing-file note) to stderr
 * @throws {Error} If an explicitly specified env file doesn't exist or dotenv parsing fails
 */
export function loadEnvironmentFile(envFilePath?: string, verbose?: boolean): EnvFileReport {
  const fileName = envFilePath || DEFAULT_ENV_FILENAME;
  const baseDir = process.env.INIT_CWD || process.cwd();
  const resolvedPath = path.resolve(baseDir, fileName);
  const isDefaultFile = !envFilePath;

  if (!fs.existsSync(resolvedPath)) {
    if (isDefaultFile) {
      if (verbose === true) {
        writeStderr(`${WARN_DEFAULT_ENV_MISSING} ${resolvedPath}. Continuing without loading environment variables.\n`);
      }
      return { suppliedBackends: [], shadowedBackends: [] };
    }
    throw new Error(`${ERROR_ENV_FILE_NOT_FOUND}: ${resolvedPath}`);
  }

  const alreadySet = new Set(Object.keys(process.env).filter((name) => process.env[name] !== ''));
  const result = dotenv.config({ path: resolvedPath });

  if (result.error) {
    throw new Error(`${ERROR_ENV_FILE_LOAD_FAILED}: ${result.error.message}`);
  }

  const parsed = result.parsed ?? {};
  const report: EnvFileReport = { path: resolvedPath, suppliedBackends: [], shadowedBackends: [] };
  for (const kind of Object.values(BACKEND_KINDS)) {
    const envName = BACKEND_REGISTRY[kind].credentialEnv;
    const fromFile = parsed[envName];
    if (fromFile === undefined || fromFile === '') {
      continue;
    }
    if (alreadySet.has(envName)) {
      report.shadowedBackends.push(kind);
    } else {
      report.suppliedBackends.push(kind);
    }
  }

  if (verbose === true) {
    writeStderr(describeReport(report));
  }
  return report;
}

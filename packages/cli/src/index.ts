#!/usr/bin/env node
import { readFileSync } from 'fs';
import { join } from 'path';

import { Command } from 'commander';
import { EXIT_GENERAL_ERROR, isRecord, logInfo, logWarning } from 'crosstalk-core';

import { debateCommand, loadConfig as loadDebateConfig } from './commands/debate';

export const PROGRAM_NAME = 'crosstalk';

/**
 * Outputs a warning message to stderr with unified formatting.
 */
export function warnUser(message: string): void {
  logWarning(message);
}

/**
 * Outputs an info message to stderr with unified formatting.
 */
export function infoUser(message: string): void {
  logInfo(message);
}

/**
 * Gets the package version from package.json, or 'unknown' if it cannot be read.
 */
function getPackageVersion(): string {
  try {
    // Compiled: __dirname is dist/; from sources: src/. Both sit beside package.json.
    const packageJsonPath = join(__dirname, '../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
  } catch (_error) {
    return 'unknown';
  }
}

/**
 * Runs the CLI for the multi-model debate system.
 *
 * @param argv - Command-line arguments, excluding 'node' and the script name.
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program.name(PROGRAM_NAME).description('Multi-model debate with synthesis').version(getPackageVersion());

  debateCommand(program);

  await program.parseAsync(['node', PROGRAM_NAME, ...argv]);
}

// If called directly from node
if (require.main === module) {
  runCli(process.argv.slice(2)).catch((err: unknown) => {
    // Map generic error when not already code-tagged
    const code = (err && typeof err === 'object' && 'code' in err && typeof err.code === 'number') ? err.code : EXIT_GENERAL_ERROR;
    const msg = (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') ? err.message : 'Unknown error';
    process.stderr.write(msg + '\n');
    process.exit(code);
  });
}

// Re-export config loader for tests
export const loadConfig = loadDebateConfig;

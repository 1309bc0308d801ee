import fs from 'fs';
import path from 'path';

import { DEFAULT_PROMPT_TEMPLATES, PromptTemplates } from '../prompts/debate-prompts';
import type { PromptPathsConfig } from '../types/config.types';

import { logWarning } from './console';

export const PROMPT_SOURCES = {
  FILE: 'file',
  BUILT_IN: 'built-in',
} as const;

export type PromptSourceType = (typeof PROMPT_SOURCES)[keyof typeof PROMPT_SOURCES];

export interface PromptResolveResult {
  text: string;
  source: PromptSourceType;
  absPath?: string;
}

/**
 * Resolves a prompt template's text, either from a specified file or from a built-in default.
 *
 * If the file is missing, unreadable, not a file, or empty (after trimming), a
 * warning is logged and the default text is used. Relative paths resolve against
 * the configuration directory.
 *
 * @param params.label - Human-readable label for warning messages (e.g. "reflection").
 * @param params.configDir - Directory to resolve relative prompt paths against.
 * @param params.promptPath - Optional path to the template file.
 * @param params.defaultText - Built-in template text.
 */
export function resolvePrompt(params: { label: string; configDir: string; promptPath?: string | undefined; defaultText: string }): PromptResolveResult {
  const { label, configDir, promptPath, defaultText } = params;
  if (!promptPath || promptPath.trim().length === 0) {
    return { text: defaultText, source: PROMPT_SOURCES.BUILT_IN };
  }
  const abs = path.isAbsolute(promptPath) ? promptPath : path.resolve(configDir, promptPath);
  const fallback = (): PromptResolveResult => {
    logWarning(`Prompt template file not usable for ${label} at ${abs}. Falling back to built-in default.`);
    return { text: defaultText, source: PROMPT_SOURCES.BUILT_IN };
  };
  try {
    if (!fs.existsSync(abs) || !fs.statSync(abs).isFile()) {
      return fallback();
    }
    const raw = fs.readFileSync(abs, 'utf-8');
    if (raw.trim().length === 0) {
      return fallback();
    }
    return { text: raw, source: PROMPT_SOURCES.FILE, absPath: abs };
  } catch (_err) {
    return fallback();
  }
}

/**
 * Builds the full template set for a run, taking each template from its
 * configured file when usable and from the built-in default otherwise.
 */
export function resolvePromptTemplates(paths: PromptPathsConfig, configDir: string): PromptTemplates {
  const resolve = (label: keyof PromptTemplates, promptPath: string | undefined): string =>
    resolvePrompt({ label, configDir, promptPath, defaultText: DEFAULT_PROMPT_TEMPLATES[label] }).text;

  return {
    initial: resolve('initial', paths.initialPath),
    reflection: resolve('reflection', paths.reflectionPath),
    synthesis: resolve('synthesis', paths.synthesisPath),
    scoring: resolve('scoring', paths.scoringPath),
  };
}

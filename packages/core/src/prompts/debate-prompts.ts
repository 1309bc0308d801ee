/**
 * Prompt templates for each debate phase. Placeholders use `{name}` and are
 * filled by `fillTemplate`; any other braces in a template are left alone.
 */
export interface PromptTemplates {
  initial: string;
  reflection: string;
  synthesis: string;
  scoring: string;
}

export const INITIAL_PROMPT = `You are one member of a panel of language models answering the same question independently.
Give your best answer to the query below. Be thorough, but keep it focused.

Query: {query}`;

export const REFLECTION_PROMPT = `You are on a panel of language models that each answered the same query. Your earlier answer is shown first, then the answers of the other panelists.

Your earlier answer:
{own_response}

Answers from the rest of the panel:
{other_responses}

Compare your answer with theirs. Note where you agree and where you disagree, what they covered that you missed, and what you got right that they did not. Then give your revised answer to the original query.

Original query: {query}`;

export const SYNTHESIS_PROMPT = `You have been chosen to write the final answer for a panel of language models. The full discussion follows: every panelist's first answer and each revision round.

Original query: {query}

{formatted_transcript}

Combine the strongest points from the panel into one coherent answer. Point out where the panel agreed and which disagreements remain open. Write a unified answer rather than a list of what each panelist said.`;

export const SCORING_PROMPT = `You are grading an answer against a known-correct reference.

Query: {query}

Reference answer:
{ground_truth}

Answer to grade:
{synthesis}

Rate the answer on two scales from 1 (poor) to 5 (excellent):
- ACCURACY: how factually consistent it is with the reference.
- COMPLETENESS: how much of the reference's substance it covers.

Reply in exactly this format:
ACCURACY: <1-5>
COMPLETENESS: <1-5>
EXPLANATION: <one short paragraph>`;

export const DEFAULT_PROMPT_TEMPLATES: Readonly<PromptTemplates> = Object.freeze({
  initial: INITIAL_PROMPT,
  reflection: REFLECTION_PROMPT,
  synthesis: SYNTHESIS_PROMPT,
  scoring: SCORING_PROMPT,
});

/** Placeholder names `fillTemplate` knows about. */
export const PROMPT_PLACEHOLDERS = [
  'query',
  'own_response',
  'other_responses',
  'formatted_transcript',
  'ground_truth',
  'synthesis',
] as const;

export type PromptPlaceholder = (typeof PROMPT_PLACEHOLDERS)[number];

const PLACEHOLDER_PATTERN = new RegExp(`\\{(${PROMPT_PLACEHOLDERS.join('|')})\\}`, 'g');

/**
 * Replaces known `{placeholder}` tokens with their values in a single pass, so
 * braces inside substituted text are never expanded. Unknown names, and known
 * names without a value, are left as written.
 */
export function fillTemplate(template: string, values: Partial<Record<PromptPlaceholder, string>>): string {
  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: PromptPlaceholder) => values[name] ?? match);
}

/** Shown in place of a member's own answer when its previous call failed. */
export const NO_RESPONSE_PLACEHOLDER = '[No response available]';

/**
 * An alias and the text it produced.
 */
export interface AttributedResponse {
  alias: string;
  text: string;
}

/**
 * Formats responses as `[alias]:\ntext` blocks separated by blank lines.
 */
export function formatAttributedResponses(responses: readonly AttributedResponse[]): string {
  return responses.map(({ alias, text }) => `[${alias}]:\n${text}`).join('\n\n');
}

/**
 * A round's successful responses, for the synthesis transcript.
 */
export interface RoundSummary {
  roundType: string;
  responses: AttributedResponse[];
}

/**
 * Formats rounds as `=== INITIAL ROUND ===` style sections separated by blank lines.
 */
export function formatTranscriptForSynthesis(rounds: readonly RoundSummary[]): string {
  return rounds
    .map((round) => `=== ${round.roundType.toUpperCase()} ROUND ===\n\n${formatAttributedResponses(round.responses)}`)
    .join('\n\n');
}

/**
 * Prepends per-panelist context to a prompt. Empty context leaves the prompt unchanged.
 */
export function injectContext(prompt: string, context: string | undefined): string {
  if (context === undefined || context.length === 0) {
    return prompt;
  }
  return `${context}\n\n${prompt}`;
}

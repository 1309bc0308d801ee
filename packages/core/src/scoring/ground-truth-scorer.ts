import { erroredResult } from '../backends/backend-client';
import type { Dispatcher } from '../dispatch/batch-dispatcher';
import { DEFAULT_PROMPT_TEMPLATES, fillTemplate } from '../prompts/debate-prompts';
import { resolvePanelMember, RoutingInputs } from '../routing/routing-resolver';
import { PanelMember, RESULT_ROLES, RoutedRequest, SCORING_ROUND } from '../types/backend.types';
import type { GroundTruthScore } from '../types/debate.types';
import { getErrorMessage } from '../utils/errors';

const SCORE_MIN = 1;
const SCORE_MAX = 5;
/** Score reported when the judge's output cannot be used. */
export const UNSCORED = -1;

export interface ParsedScore {
  accuracy: number;
  completeness: number;
  explanation: string;
}

function parseScoreField(content: string, field: string): number {
  const match = new RegExp(`${field}\\s*:\\s*(\\S+)`, 'i').exec(content);
  const raw = match?.[1];
  if (raw === undefined) {
    throw new Error(`Missing ${field.toUpperCase()} field in judge response`);
  }
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new Error(`Non-numeric ${field.toUpperCase()} value: ${raw}`);
  }
  return Math.min(SCORE_MAX, Math.max(SCORE_MIN, Number.parseInt(raw, 10)));
}

/**
 * Parses a judge reply of the form `ACCURACY: n`, `COMPLETENESS: n`,
 * `EXPLANATION: text`. Field names are case-insensitive; scores are clamped to 1-5;
 * the explanation is everything after its label, trimmed, and may be empty.
 *
 * @throws {Error} If either score is missing or not an integer.
 */
export function parseScoreResponse(content: string): ParsedScore {
  const accuracy = parseScoreField(content, 'accuracy');
  const completeness = parseScoreField(content, 'completeness');
  const explanation = /explanation\s*:\s*([\s\S]*)/i.exec(content)?.[1]?.trim() ?? '';
  return { accuracy, completeness, explanation };
}

function unscored(explanation: string, judgeAlias: string): GroundTruthScore {
  return {
    accuracy: UNSCORED,
    completeness: UNSCORED,
    overall: UNSCORED,
    explanation,
    judgeModel: judgeAlias,
  };
}

export interface ScoreSynthesisParams {
  dispatcher: Dispatcher;
  routing: RoutingInputs;
  query: string;
  synthesisContent: string;
  groundTruth: string;
  judgeAlias: string;
  template?: string;
}

/**
 * Grades a synthesis against a known-correct reference with an LLM judge
 * (round `SCORING_ROUND`). Never throws for judge failures: an errored call or
 * unparseable reply yields -1 scores with the reason in `explanation`.
 */
export async function scoreSynthesis(params: ScoreSynthesisParams): Promise<GroundTruthScore> {
  const { dispatcher, routing, query, synthesisContent, groundTruth, judgeAlias } = params;
  const prompt = fillTemplate(params.template ?? DEFAULT_PROMPT_TEMPLATES.scoring, {
    query,
    ground_truth: groundTruth,
    synthesis: synthesisContent,
  });

  let member: PanelMember;
  try {
    member = resolvePanelMember(judgeAlias, routing);
  } catch (error: unknown) {
    return unscored(`Judge could not be routed: ${getErrorMessage(error)}`, judgeAlias);
  }

  const request: RoutedRequest = {
    alias: judgeAlias,
    modelId: member.modelId,
    roundNumber: SCORING_ROUND,
    role: RESULT_ROLES.SCORING,
    prompt,
    routing: member.routing,
  };
  const [dispatched] = await dispatcher.dispatch([request]);
  const result = dispatched ?? erroredResult(request, 'Dispatcher returned no result');

  if (result.error !== undefined) {
    return unscored(`Judge call failed: ${result.error}`, judgeAlias);
  }
  try {
    const { accuracy, completeness, explanation } = parseScoreResponse(result.content);
    return {
      accuracy,
      completeness,
      overall: (accuracy + completeness) / 2,
      explanation,
      judgeModel: judgeAlias,
    };
  } catch (_parseError) {
    return unscored(`Judge output could not be parsed: ${result.content}`, judgeAlias);
  }
}

import { erroredResult } from '../backends/backend-client';
import { injectContext } from '../prompts/debate-prompts';
import { resolveModelId, resolvePanelMember } from '../routing/routing-resolver';
import { BackendRequest, ResultRole, RoundResult, RoutedRequest } from '../types/backend.types';
import { DebateRound, RoundType } from '../types/debate.types';
import { getOwn } from '../utils/common';
import { getErrorMessage } from '../utils/errors';

import { NodeContext } from './node';

/**
 * One round to run: who is asked, and the prompt each of them gets.
 */
export interface RoundPlan {
  roundNumber: number;
  roundType: RoundType;
  role: ResultRole;
  aliases: readonly string[];
  buildPrompt(alias: string): string;
}

type Slot = { kind: 'routed'; request: RoutedRequest } | { kind: 'failed'; result: RoundResult };

function planSlot(context: NodeContext, plan: RoundPlan, alias: string): Slot {
  const prompt = injectContext(plan.buildPrompt(alias), getOwn(context.panelistContext, alias));
  try {
    const member = resolvePanelMember(alias, context.routing);
    return {
      kind: 'routed',
      request: {
        alias,
        modelId: member.modelId,
        roundNumber: plan.roundNumber,
        role: plan.role,
        prompt,
        routing: member.routing,
      },
    };
  } catch (error: unknown) {
    // Routing failures stay in this member's slot; the rest of the round is dispatched.
    const request: BackendRequest = {
      alias,
      modelId: safeModelId(context, alias),
      roundNumber: plan.roundNumber,
      role: plan.role,
      prompt,
    };
    return { kind: 'failed', result: erroredResult(request, getErrorMessage(error)) };
  }
}

function safeModelId(context: NodeContext, alias: string): string {
  try {
    return resolveModelId(alias, context.routing.catalog);
  } catch (_err) {
    return alias;
  }
}

/**
 * Resolves routing for every alias in the plan, dispatches the routable requests
 * as one batch, and returns the round with results in plan order.
 */
export async function executeRound(context: NodeContext, plan: RoundPlan): Promise<DebateRound> {
  const slots = plan.aliases.map((alias) => planSlot(context, plan, alias));
  const routed = slots.flatMap((slot) => (slot.kind === 'routed' ? [slot.request] : []));
  const dispatched = routed.length > 0 ? await context.dispatcher.dispatch(routed) : [];

  let next = 0;
  const results = slots.map((slot): RoundResult => {
    if (slot.kind === 'failed') {
      return slot.result;
    }
    const result = dispatched[next];
    next++;
    return result ?? erroredResult(slot.request, 'Dispatcher returned no result');
  });

  for (const result of results) {
    if (result.error !== undefined) {
      context.logger.warn(`[${result.alias}] ${plan.roundType} call failed: ${result.error}`);
    }
  }

  return Object.freeze({
    roundNumber: plan.roundNumber,
    roundType: plan.roundType,
    results: Object.freeze(results),
  });
}

import type { RoundResult } from '../types/backend.types';
import type { DebateHooks, DebateRound, RoundObserver, RoundType } from '../types/debate.types';
import { ObserverError } from '../utils/errors';
import type { Logger } from '../utils/logger';

/**
 * Invokes caller hooks so that a throwing or rejecting hook is logged and the
 * debate carries on. Every hook is awaited before the engine continues.
 */
export class GuardedHooks {
  constructor(
    private readonly hooks: DebateHooks,
    private readonly logger: Logger,
    private readonly runObserver?: RoundObserver
  ) {}

  async roundStart(roundNumber: number, roundType: RoundType, totalRounds: number): Promise<void> {
    const hook = this.hooks.onRoundStart;
    if (hook) {
      await this.guard('onRoundStart', () => hook(roundNumber, roundType, totalRounds));
    }
  }

  /**
   * Notifies the orchestrator-level hook, then the per-run observer.
   */
  async roundComplete(round: DebateRound): Promise<void> {
    const hook = this.hooks.onRoundComplete;
    if (hook) {
      await this.guard('onRoundComplete', () => hook(round));
    }
    const observer = this.runObserver;
    if (observer) {
      await this.guard('onRoundComplete', () => observer(round));
    }
  }

  async synthesisStart(synthesizer: string): Promise<void> {
    const hook = this.hooks.onSynthesisStart;
    if (hook) {
      await this.guard('onSynthesisStart', () => hook(synthesizer));
    }
  }

  async synthesisComplete(result: RoundResult): Promise<void> {
    const hook = this.hooks.onSynthesisComplete;
    if (hook) {
      await this.guard('onSynthesisComplete', () => hook(result));
    }
  }

  private async guard(hookName: string, invoke: () => void | Promise<void>): Promise<void> {
    try {
      await invoke();
    } catch (error: unknown) {
      this.logger.error(new ObserverError(hookName, error).message);
    }
  }
}

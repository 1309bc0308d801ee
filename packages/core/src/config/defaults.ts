import { ModelCatalog, ROUTING_MODES, RoutingMode } from '../types/backend.types';

/**
 * Built-in aliases. Aggregator ids are vendor-prefixed; `direct` is only given
 * where the vendor's own id differs from the un-prefixed aggregator id.
 */
export const DEFAULT_MODEL_CATALOG: ModelCatalog = Object.freeze({
  claude: Object.freeze({ openrouter: 'anthropic/claude-sonnet-4.5', direct: 'claude-sonnet-4-5-20250929' }),
  gpt: Object.freeze({ openrouter: 'openai/gpt-5.2', direct: 'gpt-5.2' }),
  gemini: Object.freeze({ openrouter: 'google/gemini-2.5-pro' }),
  grok: Object.freeze({ openrouter: 'x-ai/grok-4' }),
});

export const DEFAULT_PANEL: readonly string[] = Object.freeze(['claude', 'gpt', 'gemini', 'grok']);
export const DEFAULT_SYNTHESIZER = 'claude';
export const DEFAULT_ROUTING_MODE: RoutingMode = ROUTING_MODES.AUTO;
export const DEFAULT_CONFIG_FILENAME = 'crosstalk.config.json';

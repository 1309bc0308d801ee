import { BACKEND_KINDS, BackendKind } from '../types/backend.types';

import { AnthropicClient, ANTHROPIC_BASE_URL } from './anthropic-client';
import { BackendClient, BackendClientOptions } from './backend-client';
import { OpenAICompatibleClient } from './openai-compatible-client';

/**
 * OpenRouter attribution headers.
 */
const OPENROUTER_HTTP_REFERER = 'crosstalk';
const OPENROUTER_X_TITLE = 'Crosstalk - Multi-Model Debate';
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * Static description of one backend kind.
 */
export interface BackendDefinition {
  /** Environment variable holding the API key. */
  credentialEnv: string;
  defaultBaseUrl: string;
  create(options: BackendClientOptions): BackendClient;
}

function openAICompatible(kind: BackendKind, credentialEnv: string, defaultBaseUrl: string): BackendDefinition {
  return {
    credentialEnv,
    defaultBaseUrl,
    create: (options) => new OpenAICompatibleClient(kind, options, defaultBaseUrl),
  };
}

/**
 * Fixed table of every backend the router knows. Adding a backend means adding a row here.
 */
export const BACKEND_REGISTRY: Readonly<Record<BackendKind, BackendDefinition>> = {
  [BACKEND_KINDS.ANTHROPIC]: {
    credentialEnv: 'ANTHROPIC_API_KEY',
    defaultBaseUrl: ANTHROPIC_BASE_URL,
    create: (options) => new AnthropicClient(options),
  },
  [BACKEND_KINDS.OPENAI]: openAICompatible(BACKEND_KINDS.OPENAI, 'OPENAI_API_KEY', 'https://api.openai.com/v1'),
  [BACKEND_KINDS.GOOGLE]: openAICompatible(BACKEND_KINDS.GOOGLE, 'GOOGLE_API_KEY', 'https://generativelanguage.googleapis.com/v1beta/openai/'),
  [BACKEND_KINDS.XAI]: openAICompatible(BACKEND_KINDS.XAI, 'XAI_API_KEY', 'https://api.x.ai/v1'),
  [BACKEND_KINDS.GROQ]: openAICompatible(BACKEND_KINDS.GROQ, 'GROQ_API_KEY', 'https://api.groq.com/openai/v1'),
  [BACKEND_KINDS.OPENROUTER]: {
    credentialEnv: 'OPENROUTER_API_KEY',
    defaultBaseUrl: OPENROUTER_BASE_URL,
    create: (options) =>
      new OpenAICompatibleClient(
        BACKEND_KINDS.OPENROUTER,
        {
          ...options,
          defaultHeaders: {
            'HTTP-Referer': OPENROUTER_HTTP_REFERER,
            'X-Title': OPENROUTER_X_TITLE,
          },
        },
        OPENROUTER_BASE_URL
      ),
  },
};

/**
 * Creates a backend client of the given kind.
 *
 * @throws {BackendConfigError} If the API key is missing or the base URL is malformed.
 */
export function createBackendClient(kind: BackendKind, options: BackendClientOptions): BackendClient {
  return BACKEND_REGISTRY[kind].create(options);
}

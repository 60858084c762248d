import OpenAI from 'openai';
import { config, isOracleConfigured } from '../config.js';
import type { OracleClient, OraclePrompt } from './agents/intentClassifier.js';

// Lazy initialization: the module loads without a key, and no client is built until first use
let openaiInstance: OpenAI | null = null;

function getOpenAIClient(apiKey: string): OpenAI {
  if (openaiInstance) {
    return openaiInstance;
  }

  console.log('🔧 Initializing OpenAI client...');

  openaiInstance = new OpenAI({
    apiKey,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: 0,
    timeout: config.INTENT_TIMEOUT_MS,
  });

  console.log('✅ OpenAI client initialized');
  console.log(`   Intent model: ${config.OPENAI_INTENT_MODEL}`);
  console.log(`   Timeout: ${config.INTENT_TIMEOUT_MS}ms`);

  return openaiInstance;
}

/**
 * Oracle client backed by chat completions in JSON mode; a single attempt per question
 */
export class OpenAIOracleClient implements OracleClient {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(prompt: OraclePrompt): Promise<string | null> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      response_format: { type: 'json_object' },
      temperature: 0.1,
      max_tokens: 400,
    });

    return response.choices[0]?.message?.content ?? null;
  }
}

/**
 * The configured oracle, or null when no key is set or the keyword classifier is forced
 */
export function getOracleClient(): OracleClient | null {
  if (!isOracleConfigured(config) || !config.OPENAI_API_KEY) {
    return null;
  }
  return new OpenAIOracleClient(getOpenAIClient(config.OPENAI_API_KEY), config.OPENAI_INTENT_MODEL);
}

import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { Settings } from './config';
import { ConfigurationError, errorMessage } from './errors';
import type { ChatMessage } from './types';
import type { Logger } from './utils/logger';

export interface CompletionRequest {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  timeoutMs?: number;
}

/**
 * Anything that turns an ordered list of role-tagged messages into text.
 */
export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<string>;
}

export class OpenAICompletionProvider implements CompletionProvider {
  private readonly openai: OpenAIProvider;

  constructor(
    settings: Pick<Settings, 'openaiApiKey' | 'openaiBaseUrl'>,
    private readonly logger: Logger,
  ) {
    if (!settings.openaiApiKey) {
      throw new ConfigurationError(
        'OPENAI_API_KEY environment variable is not set',
      );
    }
    this.openai = createOpenAI({
      apiKey: settings.openaiApiKey,
      baseURL: settings.openaiBaseUrl,
    });
  }

  async complete({
    messages,
    model,
    temperature,
    timeoutMs,
  }: CompletionRequest): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.openai(model),
        messages,
        temperature,
        abortSignal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined,
      });

      return text.trim();
    } catch (error) {
      this.logger.error(`Error from LLM: ${errorMessage(error)}`, { model });
      throw error;
    }
  }
}

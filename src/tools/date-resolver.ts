import type { CompletionProvider } from '../llm';
import { RELATIVE_DAY_OFFSETS, addDays, isIsoDate } from '../utils/dates';
import { getDateNormalizationPrompt } from './prompts/date-normalization-prompt';

export interface DateResolverOptions {
  provider: CompletionProvider;
  model: string;
  timeoutMs: number;
  today: () => string;
}

/**
 * Turns a date expression into an ISO date. ISO input and common relative
 * phrases are resolved locally; anything else is asked to the model.
 */
export class DateResolver {
  constructor(private readonly options: DateResolverOptions) {}

  today(): string {
    return this.options.today();
  }

  async resolve(text: string): Promise<string> {
    const input = text.trim();
    if (isIsoDate(input)) {
      return input;
    }

    const today = this.options.today();
    const offset = RELATIVE_DAY_OFFSETS.get(input.toLowerCase());
    if (offset !== undefined) {
      return addDays(today, offset);
    }

    const reply = await this.options.provider.complete({
      model: this.options.model,
      temperature: 0,
      timeoutMs: this.options.timeoutMs,
      messages: [
        { role: 'system', content: getDateNormalizationPrompt(today) },
        {
          role: 'user',
          content: `Input: ${input}\nReturn only the ISO date, nothing else.`,
        },
      ],
    });

    const candidate = reply.trim();
    if (candidate.toUpperCase().startsWith('ERROR') || !isIsoDate(candidate)) {
      throw new Error(`Could not parse date from: "${input}"`);
    }
    return candidate;
  }
}

import type { ChatMessage } from '../types';

/**
 * Context of a single run: the system prompt, the user query and the
 * observation blocks gathered so far. Append-only.
 */
export class Conversation {
  private readonly blocks: string[] = [];

  constructor(
    private readonly systemPrompt: string,
    private readonly query: string,
  ) {}

  append(block: string): void {
    this.blocks.push(block);
  }

  get size(): number {
    return this.blocks.length;
  }

  toMessages(instruction?: string): ChatMessage[] {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: this.query },
    ];
    if (this.blocks.length > 0) {
      messages.push({ role: 'assistant', content: this.blocks.join('\n') });
    }
    if (instruction) {
      messages.push({ role: 'user', content: instruction });
    }
    return messages;
  }
}

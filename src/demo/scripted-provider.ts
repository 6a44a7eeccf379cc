import { LlmProvider, LlmRequest, LlmResponse } from '../adapters/llm-adapter';

function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Replays prepared answers in order, for running the demo without a model.
 * Token usage is approximated by word counts.
 */
export class ScriptedProvider implements LlmProvider {
  private index = 0;

  constructor(private readonly replies: string[]) {
    if (replies.length === 0) {
      throw new Error('ScriptedProvider needs at least one reply');
    }
  }

  async generate(request: LlmRequest): Promise<LlmResponse> {
    const text = this.replies[this.index % this.replies.length];
    this.index++;

    const promptTokens = request.messages.reduce((total, message) => total + countWords(message.content), 0);
    return {
      text,
      usage: { promptTokens, completionTokens: countWords(text) }
    };
  }
}

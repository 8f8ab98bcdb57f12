import type { ChatMessage } from '../../core/llm.js';
import type { HistoryEntry } from '../../memory/history.js';

export interface PromptInput {
  system: string;
  userMessage: string;
  history?: HistoryEntry[];
  additionalContext?: string;
  /** Rendered tool observations, shown to the model before the user message. */
  toolSummary?: string;
}

/**
 * System prompt, prior turns, optional context, then the message being handled.
 */
export function buildPromptMessages(input: PromptInput): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: input.system }];

  for (const entry of input.history ?? []) {
    messages.push({ role: entry.role, content: entry.content });
  }

  if (input.toolSummary) {
    messages.push({ role: 'assistant', content: `Context: ${input.toolSummary}` });
  }
  if (input.additionalContext) {
    messages.push({ role: 'assistant', content: input.additionalContext });
  }

  messages.push({ role: 'user', content: input.userMessage });
  return messages;
}

export function summarizeToolResults(results: Map<string, string>): string {
  return [...results.entries()].map(([name, result]) => `${name}: ${result}`).join('; ');
}

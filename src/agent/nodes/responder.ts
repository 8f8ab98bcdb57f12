/**
 * Responder node
 *
 * Picks the answer text (dispatcher answer, then dispatcher error, then a fresh
 * synthesis), writes the exchange to history and fills in the turn metadata.
 */

import { describeError } from '../../core/errors.js';
import type { NodeContext } from '../graph/context.js';
import { buildMetadata } from '../graph/state.js';
import { DISPATCH_ERROR_KEY, FINAL_RESPONSE_KEY, type TurnState } from '../graph/types.js';
import { buildPromptMessages, summarizeToolResults } from './messages.js';

export const SYNTHESIS_FALLBACK =
  "I apologize, but I couldn't generate a proper response. Please try again.";

async function synthesize(state: TurnState, ctx: NodeContext): Promise<string> {
  try {
    const reply = await ctx.gateway.complete(
      buildPromptMessages({
        system: ctx.prompts.responder,
        userMessage: state.originalMessage,
        history: ctx.history.last(ctx.options.responderHistoryLimit),
        toolSummary: summarizeToolResults(state.toolResults) || undefined,
      })
    );
    if (!reply.content.trim()) {
      ctx.logger.warn('Responder received an empty completion');
      return SYNTHESIS_FALLBACK;
    }
    ctx.logger.info(`Response generated: ${reply.content.length} characters`);
    return reply.content;
  } catch (error) {
    ctx.logger.error(`Response synthesis failed: ${describeError(error)}`);
    return SYNTHESIS_FALLBACK;
  }
}

export async function runResponder(state: TurnState, ctx: NodeContext): Promise<void> {
  const dispatched = state.toolResults.get(FINAL_RESPONSE_KEY);
  const dispatchError = state.toolResults.get(DISPATCH_ERROR_KEY);

  if (dispatched !== undefined) {
    state.finalResponse = dispatched;
  } else if (dispatchError !== undefined) {
    state.finalResponse = dispatchError;
  } else {
    state.finalResponse = await synthesize(state, ctx);
  }

  try {
    ctx.history.appendUser(state.originalMessage);
    ctx.history.appendAssistant(state.finalResponse);
  } catch (error) {
    ctx.logger.error(`Failed to record conversation history: ${describeError(error)}`);
  }

  state.metadata = buildMetadata(state);
}

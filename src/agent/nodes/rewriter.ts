/**
 * Rewriter node
 *
 * Turns a vague message into a concrete one. Always records a RewriteResult, echoing
 * the original message when the model call fails, so the router never sends the
 * turn back here.
 */

import { describeError } from '../../core/errors.js';
import type { NodeContext } from '../graph/context.js';
import { setRewrite } from '../graph/state.js';
import { RewriteResultSchema, type RewriteResult, type TurnState } from '../graph/types.js';
import { buildPromptMessages } from './messages.js';

export function echoRewrite(message: string): RewriteResult {
  return { rewritten_message: message, clarifications_added: [], confidence: 0 };
}

export async function runRewriter(state: TurnState, ctx: NodeContext): Promise<void> {
  const reasoning = state.classification?.reasoning;

  let rewrite: RewriteResult;
  try {
    rewrite = await ctx.gateway.completeStructured(
      buildPromptMessages({
        system: ctx.prompts.rewriter,
        userMessage: state.originalMessage,
        history: ctx.history.last(ctx.options.historyLimit),
        additionalContext: reasoning ? `Classification reasoning: ${reasoning}` : undefined,
      }),
      { name: 'RewriteResult', schema: RewriteResultSchema }
    );
    ctx.logger.info(`Rewrote message: '${state.originalMessage}' -> '${rewrite.rewritten_message}'`);
  } catch (error) {
    ctx.logger.warn(`Rewriter failed, keeping the original message: ${describeError(error)}`);
    rewrite = echoRewrite(state.currentMessage || state.originalMessage);
  }

  setRewrite(state, rewrite);
}

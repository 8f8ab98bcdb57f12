/**
 * Classifier node
 *
 * Asks the model for a Decision about the message in play. A failed call degrades
 * to an `error` intent so the turn still reaches the responder.
 */

import { describeError } from '../../core/errors.js';
import type { NodeContext } from '../graph/context.js';
import { activeMessage, setClassification } from '../graph/state.js';
import { DecisionSchema, type Decision, type TurnState } from '../graph/types.js';
import { buildPromptMessages } from './messages.js';

export async function runClassifier(state: TurnState, ctx: NodeContext): Promise<void> {
  const message = activeMessage(state);
  const logger = ctx.logger;

  let decision: Decision;
  try {
    decision = await ctx.gateway.completeStructured(
      buildPromptMessages({
        system: ctx.prompts.classifier,
        userMessage: message,
        history: ctx.history.last(ctx.options.historyLimit),
      }),
      { name: 'Decision', schema: DecisionSchema }
    );
    logger.info(
      `Classified intent: ${decision.intent} (confidence: ${decision.confidence.toFixed(2)}, rewrite: ${decision.needs_rewrite})`
    );
  } catch (error) {
    logger.error(`Classifier failed: ${describeError(error)}`);
    decision = {
      intent: 'error',
      confidence: 0,
      needs_rewrite: false,
      reasoning: `Error in classifier: ${describeError(error)}`,
    };
  }

  setClassification(state, decision, message);
}

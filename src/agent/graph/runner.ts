/**
 * Turn graph runner
 *
 * Drives one TurnState from the classifier to the terminal node. Node handlers
 * contain their own failures; anything thrown here is a runner fault and goes to
 * the caller.
 */

import { GraphExecutionError } from '../../core/errors.js';
import { runClassifier } from '../nodes/classifier.js';
import { runResponder } from '../nodes/responder.js';
import { runRewriter } from '../nodes/rewriter.js';
import { runToolDispatcher } from '../nodes/tool-dispatcher.js';
import type { NodeContext } from './context.js';
import { nextNode } from './router.js';
import { createTurnState, recordVisit } from './state.js';
import type { NodeId, TurnState } from './types.js';

type NodeHandler = (state: TurnState, ctx: NodeContext) => Promise<void>;

const HANDLERS: Record<Exclude<NodeId, 'terminal'>, NodeHandler> = {
  classifier: runClassifier,
  rewriter: runRewriter,
  tool_dispatcher: runToolDispatcher,
  responder: runResponder,
};

export const ENTRY_NODE: NodeId = 'classifier';

export async function runTurnGraph(message: string, ctx: NodeContext): Promise<TurnState> {
  const state = createTurnState(message);
  let current: NodeId = ENTRY_NODE;

  while (current !== 'terminal') {
    if (state.trail.length >= ctx.options.maxSteps) {
      throw new GraphExecutionError(
        `Turn exceeded ${ctx.options.maxSteps} node visits (${state.trail.join(' -> ')})`
      );
    }
    recordVisit(state, current);
    ctx.logger.debug(`Entering node ${current}`);
    await HANDLERS[current](state, ctx);
    current = nextNode(current, state);
  }

  return state;
}

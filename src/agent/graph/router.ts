/**
 * Graph edges.
 *
 * Pure functions of (current node, turn state); no I/O, so every transition can
 * be table-tested without the node handlers.
 */

import type { NodeId, TurnState } from './types.js';

type RoutingView = Pick<TurnState, 'classification' | 'rewrite'>;

/**
 * Conditional edge out of the classifier.
 *
 * The rewriter is entered at most once per turn: it always records a rewrite,
 * and a recorded rewrite closes this branch.
 */
export function routeAfterClassifier(state: RoutingView): NodeId {
  const decision = state.classification;
  if (!decision) {
    return 'terminal';
  }
  if (decision.needs_rewrite && !state.rewrite) {
    return 'rewriter';
  }
  if (decision.intent === 'tool_required') {
    return 'tool_dispatcher';
  }
  return 'responder';
}

export function nextNode(current: NodeId, state: RoutingView): NodeId {
  switch (current) {
    case 'classifier':
      return routeAfterClassifier(state);
    case 'rewriter':
      return 'classifier';
    case 'tool_dispatcher':
      return 'responder';
    case 'responder':
    case 'terminal':
      return 'terminal';
  }
}

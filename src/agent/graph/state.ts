import type { Decision, NodeId, RewriteResult, TurnMetadata, TurnState } from './types.js';

export function createTurnState(message: string): TurnState {
  return {
    originalMessage: message,
    currentMessage: message,
    toolResults: new Map(),
    finalResponse: '',
    iterationCount: 0,
    toolLoopIterations: 0,
    trail: [],
  };
}

/**
 * The message the classifier and dispatcher should work on.
 */
export function activeMessage(state: TurnState): string {
  return state.currentMessage || state.originalMessage;
}

export function recordVisit(state: TurnState, node: NodeId): void {
  state.trail.push(node);
}

export function setClassification(state: TurnState, decision: Decision, analyzed: string): void {
  state.classification = decision;
  state.currentMessage = analyzed;
  state.iterationCount += 1;
}

export function setRewrite(state: TurnState, rewrite: RewriteResult): void {
  state.rewrite = rewrite;
  state.currentMessage = rewrite.rewritten_message;
}

/**
 * Diagnostic summary; present on every completed or degraded turn.
 */
export function buildMetadata(state: TurnState): TurnMetadata {
  const metadata: TurnMetadata = {
    intent: state.classification?.intent ?? 'unknown',
    confidence: state.classification?.confidence ?? 0,
    tools_used: [...state.toolResults.keys()],
    iterations: state.iterationCount,
    was_rewritten: state.rewrite !== undefined,
  };
  if (state.toolLoopIterations > 0) {
    metadata.tool_iterations = state.toolLoopIterations;
  }
  return metadata;
}

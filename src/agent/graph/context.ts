import type { LlmGateway } from '../../core/llm.js';
import type { LoggerLike } from '../../core/logger.js';
import type { ConversationHistory } from '../../memory/history.js';
import type { PromptSet } from '../prompts.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolContext } from '../tools/types.js';

export interface GraphOptions {
  /** History entries shown to the classifier, rewriter and dispatcher. */
  historyLimit: number;
  /** History entries shown to the responder when it synthesizes. */
  responderHistoryLimit: number;
  /** Model rounds in the tool loop before the forced final answer. */
  maxToolIterations: number;
  /** Upper bound on node visits per turn. */
  maxSteps: number;
}

export const DEFAULT_GRAPH_OPTIONS: GraphOptions = {
  historyLimit: 6,
  responderHistoryLimit: 2,
  maxToolIterations: 5,
  maxSteps: 12,
};

/**
 * Everything a node handler may touch besides the turn state.
 */
export interface NodeContext {
  gateway: LlmGateway;
  tools: ToolRegistry;
  toolContext: ToolContext;
  history: ConversationHistory;
  prompts: PromptSet;
  options: GraphOptions;
  logger: LoggerLike;
}

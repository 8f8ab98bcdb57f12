/**
 * Chat session
 *
 * Built once per conversation and handed each inbound message. Turns run one at a
 * time: history and the gateway are shared across turns and are not safe to use
 * from two turns at once.
 */

import { describeError } from '../core/errors.js';
import type { LlmGateway } from '../core/llm.js';
import { silentLogger, type LoggerLike } from '../core/logger.js';
import type { ConversationHistory } from '../memory/history.js';
import { DEFAULT_GRAPH_OPTIONS, type GraphOptions, type NodeContext } from './graph/context.js';
import { runTurnGraph } from './graph/runner.js';
import { buildMetadata, createTurnState } from './graph/state.js';
import type { TurnMetadata } from './graph/types.js';
import { DEFAULT_PROMPTS, type PromptSet } from './prompts.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolContext } from './tools/types.js';

export const GRAPH_FAILURE_TEXT =
  "I'm sorry, I encountered an error processing your request. Please try again.";

export interface Visualization {
  kind: string;
  title?: string;
  spec: Record<string, unknown>;
}

export interface TableData {
  columns: string[];
  rows: Array<Array<string | number | null>>;
}

export interface AgentResponse {
  text: string;
  visualizations: Visualization[];
  data?: TableData;
  metadata: TurnMetadata;
}

export interface ModelInfo {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface SessionDescription {
  status: 'initialized';
  model: string;
  temperature: number;
  maxTokens: number;
  tools: string[];
}

export interface ChatSessionOptions {
  gateway: LlmGateway;
  tools: ToolRegistry;
  toolContext: ToolContext;
  history: ConversationHistory;
  logger?: LoggerLike;
  graph?: Partial<GraphOptions>;
  prompts?: PromptSet;
  modelInfo?: ModelInfo;
}

export class ChatSession {
  private readonly ctx: NodeContext;
  private readonly modelInfo?: ModelInfo;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: ChatSessionOptions) {
    this.ctx = {
      gateway: options.gateway,
      tools: options.tools,
      toolContext: options.toolContext,
      history: options.history,
      prompts: options.prompts ?? DEFAULT_PROMPTS,
      options: { ...DEFAULT_GRAPH_OPTIONS, ...options.graph },
      logger: options.logger ?? silentLogger,
    };
    this.modelInfo = options.modelInfo;
  }

  get history(): ConversationHistory {
    return this.ctx.history;
  }

  /**
   * Run one turn. Calls made while a turn is in flight wait for it to finish.
   */
  processMessage(text: string): Promise<AgentResponse> {
    const turn = this.queue.then(() => this.runTurn(text));
    this.queue = turn;
    return turn;
  }

  describeSession(): SessionDescription {
    return {
      status: 'initialized',
      model: this.modelInfo?.model ?? 'unknown',
      temperature: this.modelInfo?.temperature ?? 0,
      maxTokens: this.modelInfo?.maxTokens ?? 2000,
      tools: this.ctx.tools.listNames(),
    };
  }

  private async runTurn(text: string): Promise<AgentResponse> {
    try {
      const state = await runTurnGraph(text, this.ctx);
      this.ctx.logger.debug(`Turn trail: ${state.trail.join(' -> ')}`);
      return {
        text: state.finalResponse,
        visualizations: [],
        metadata: state.metadata ?? buildMetadata(state),
      };
    } catch (error) {
      this.ctx.logger.error(`Graph execution failed: ${describeError(error)}`);
      return {
        text: GRAPH_FAILURE_TEXT,
        visualizations: [],
        metadata: {
          ...buildMetadata(createTurnState(text)),
          error: describeError(error),
          type: 'graph_execution_error',
        },
      };
    }
  }
}

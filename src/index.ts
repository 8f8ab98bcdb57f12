/**
 * assetpilot
 *
 * Conversational assistant for asset time-series data.
 */

export const VERSION = '0.1.0';

export { loadConfig, parseConfig, type AssetPilotConfig } from './core/config.js';
export { Logger, silentLogger, type LoggerLike, type LogLevel } from './core/logger.js';
export {
  AssetApiError,
  ConfigError,
  GatewayError,
  GraphExecutionError,
  MalformedModelOutputError,
  ToolExecutionError,
  ToolNotFoundError,
} from './core/errors.js';
export {
  OpenAiGateway,
  createLlmGateway,
  parseStructuredContent,
  type ChatMessage,
  type LlmGateway,
  type LlmToolSchema,
  type StructuredOutputSpec,
  type ToolCallRequest,
  type ToolTurnReply,
} from './core/llm.js';
export { AssetApiClient } from './assets/client.js';
export {
  InMemoryConversationHistory,
  SqliteConversationHistory,
  type ConversationHistory,
  type HistoryEntry,
} from './memory/history.js';
export { ToolRegistry } from './agent/tools/registry.js';
export type { ToolContext, ToolDefinition } from './agent/tools/types.js';
export { createAssetTools } from './agent/tools/adapters/asset-tools.js';
export { runTurnGraph } from './agent/graph/runner.js';
export { nextNode, routeAfterClassifier } from './agent/graph/router.js';
export type { Decision, NodeId, RewriteResult, TurnMetadata, TurnState } from './agent/graph/types.js';
export {
  ChatSession,
  GRAPH_FAILURE_TEXT,
  type AgentResponse,
  type SessionDescription,
} from './agent/session.js';
export { createSession, type SessionOverrides } from './agent/factory.js';

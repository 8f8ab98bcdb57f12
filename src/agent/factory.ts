/**
 * Session factory: builds the collaborators from config and wires one ChatSession.
 */

import { AssetApiClient } from '../assets/client.js';
import type { AssetPilotConfig } from '../core/config.js';
import { createLlmGateway, type LlmGateway } from '../core/llm.js';
import { Logger, type LoggerLike } from '../core/logger.js';
import {
  InMemoryConversationHistory,
  SqliteConversationHistory,
  type ConversationHistory,
} from '../memory/history.js';
import { ChatSession } from './session.js';
import { createAssetTools } from './tools/adapters/asset-tools.js';
import { ToolRegistry } from './tools/registry.js';

export interface SessionOverrides {
  sessionId?: string;
  gateway?: LlmGateway;
  assets?: AssetApiClient;
  history?: ConversationHistory;
  logger?: LoggerLike;
}

export function createHistory(config: AssetPilotConfig, sessionId: string): ConversationHistory {
  if (config.memory.backend === 'sqlite') {
    return new SqliteConversationHistory(sessionId, config.memory.dbPath);
  }
  return new InMemoryConversationHistory();
}

export function createToolRegistry(config: AssetPilotConfig): ToolRegistry {
  return new ToolRegistry(createAssetTools({ maxListed: config.api.maxListed }));
}

export function createSession(config: AssetPilotConfig, overrides: SessionOverrides = {}): ChatSession {
  const logger = overrides.logger ?? new Logger(config.logging.level, 'assetpilot');
  const sessionId = overrides.sessionId ?? 'default';

  return new ChatSession({
    gateway: overrides.gateway ?? createLlmGateway(config, logger),
    tools: createToolRegistry(config),
    toolContext: {
      assets: overrides.assets ?? AssetApiClient.fromConfig(config),
      logger,
    },
    history: overrides.history ?? createHistory(config, sessionId),
    logger,
    graph: config.graph,
    modelInfo: {
      model: config.agent.model,
      temperature: config.agent.temperature,
      maxTokens: config.agent.maxTokens,
    },
  });
}

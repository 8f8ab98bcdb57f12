/**
 * Tool contracts shared by the registry, the adapters and the dispatcher node.
 */

import type { z } from 'zod';

import type { AssetApiClient } from '../../assets/client.js';
import type { LoggerLike } from '../../core/logger.js';

export type ToolCategory = 'assets' | 'analysis' | 'system';

/**
 * What a tool may reach while it runs.
 */
export interface ToolContext {
  assets: AssetApiClient;
  logger: LoggerLike;
  /** Injected so date defaults are testable. */
  now?: () => Date;
}

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  category: ToolCategory;
  schema: S;
  /** Resolves with the observation text; rejects when the tool cannot run. */
  execute: (input: z.infer<S>, ctx: ToolContext) => Promise<string>;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  category: ToolCategory;
}

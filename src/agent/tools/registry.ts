/**
 * Tool Registry
 *
 * Holds the fixed set of callable tools, exposes their descriptors to the model
 * and validates arguments before a tool runs.
 */

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { LlmToolSchema } from '../../core/llm.js';
import { ToolExecutionError, ToolNotFoundError } from '../../core/errors.js';
import type { ToolContext, ToolDefinition, ToolDescriptor } from './types.js';

function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(schema, { target: 'openApi3', $refStrategy: 'none' });
  return Object.fromEntries(Object.entries(jsonSchema).filter(([key]) => key !== '$schema'));
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool ${tool.name} is already registered`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  listNames(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      category: tool.category,
    }));
  }

  getLlmSchemas(): LlmToolSchema[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: toParameters(tool.schema),
    }));
  }

  /**
   * Validate `rawArgs` against the tool schema and run it.
   */
  async execute(name: string, rawArgs: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    const parsed = tool.schema.safeParse(rawArgs);
    if (!parsed.success) {
      const summary = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ToolExecutionError(name, `Invalid input: ${summary}`);
    }

    return tool.execute(parsed.data, ctx);
  }
}

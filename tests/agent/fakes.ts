import { z } from 'zod';

import { DEFAULT_GRAPH_OPTIONS, type GraphOptions, type NodeContext } from '../../src/agent/graph/context.js';
import { DEFAULT_PROMPTS } from '../../src/agent/prompts.js';
import { ToolRegistry } from '../../src/agent/tools/registry.js';
import type { ToolContext, ToolDefinition } from '../../src/agent/tools/types.js';
import { AssetApiClient } from '../../src/assets/client.js';
import type {
  ChatMessage,
  LlmGateway,
  LlmToolSchema,
  StructuredOutputSpec,
  TextReply,
  ToolCallRequest,
  ToolTurnReply,
} from '../../src/core/llm.js';
import { silentLogger } from '../../src/core/logger.js';
import { InMemoryConversationHistory } from '../../src/memory/history.js';

export type GatewayCallKind = 'complete' | 'structured' | 'tools';

export interface RecordedCall {
  kind: GatewayCallKind;
  messages: ChatMessage[];
  outputName?: string;
  toolNames?: string[];
}

/**
 * Gateway that replays queued replies per call shape. A queued Error is thrown.
 */
export class ScriptedGateway implements LlmGateway {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly script: {
      structured?: unknown[];
      tools?: Array<ToolTurnReply | Error>;
      text?: Array<string | Error>;
    } = {}
  ) {}

  async complete(messages: ChatMessage[]): Promise<TextReply> {
    this.calls.push({ kind: 'complete', messages: [...messages] });
    const next = this.script.text?.shift();
    if (next === undefined) throw new Error('no scripted text reply');
    if (next instanceof Error) throw next;
    return { content: next };
  }

  async completeStructured<T>(messages: ChatMessage[], output: StructuredOutputSpec<T>): Promise<T> {
    this.calls.push({ kind: 'structured', messages: [...messages], outputName: output.name });
    const next = this.script.structured?.shift();
    if (next === undefined) throw new Error('no scripted structured reply');
    if (next instanceof Error) throw next;
    return output.schema.parse(next);
  }

  async completeWithTools(messages: ChatMessage[], tools: LlmToolSchema[]): Promise<ToolTurnReply> {
    this.calls.push({
      kind: 'tools',
      messages: [...messages],
      toolNames: tools.map((tool) => tool.name),
    });
    const next = this.script.tools?.shift();
    if (next === undefined) throw new Error('no scripted tool reply');
    if (next instanceof Error) throw next;
    return next;
  }

  count(kind: GatewayCallKind): number {
    return this.calls.filter((call) => call.kind === kind).length;
  }
}

export function toolCall(name: string, args: Record<string, unknown> = {}, id = `call-${name}`): ToolCallRequest {
  return { id, name, arguments: args };
}

export function requestTools(...calls: ToolCallRequest[]): ToolTurnReply {
  return { content: '', toolCalls: calls };
}

export function answer(content: string): ToolTurnReply {
  return { content, toolCalls: [] };
}

export function stubTool(name: string, run: (input: { asset_key?: string }) => Promise<string>): ToolDefinition {
  return {
    name,
    description: `stub ${name}`,
    category: 'assets',
    schema: z.object({ asset_key: z.string().optional() }),
    execute: (input) => run(input),
  };
}

export function stubToolContext(): ToolContext {
  return {
    assets: new AssetApiClient({
      baseUrl: 'http://assets.test',
      timeoutMs: 1000,
      endpoints: { scan: '/assets', timeseries: '/timeseries', lastvalue: '/lastvalue' },
    }),
    logger: silentLogger,
  };
}

export function buildNodeContext(
  gateway: LlmGateway,
  options: { tools?: ToolDefinition[]; history?: InMemoryConversationHistory; graph?: Partial<GraphOptions> } = {}
): NodeContext & { history: InMemoryConversationHistory } {
  return {
    gateway,
    tools: new ToolRegistry(options.tools ?? []),
    toolContext: stubToolContext(),
    history: options.history ?? new InMemoryConversationHistory(),
    prompts: DEFAULT_PROMPTS,
    options: { ...DEFAULT_GRAPH_OPTIONS, ...options.graph },
    logger: silentLogger,
  };
}

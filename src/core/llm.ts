/**
 * Language-model gateway.
 *
 * Three call shapes: free-form text, schema-constrained JSON, and tool-enabled
 * turns whose replies may carry tool-invocation requests.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { AssetPilotConfig } from './config.js';
import { GatewayError, MalformedModelOutputError, describeError } from './errors.js';
import { silentLogger, type LoggerLike } from './logger.js';
import { classifyGatewayFailure, retryWithBackoff } from './retry.js';

export interface ToolCallRequest {
  /** Correlation id echoed back on the matching tool observation. */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; content: string; toolCallId: string };

export interface LlmToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface TextReply {
  content: string;
}

export interface ToolTurnReply {
  content: string;
  toolCalls: ToolCallRequest[];
}

/**
 * Describes the shape a structured reply must take.
 */
export interface StructuredOutputSpec<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface LlmGateway {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<TextReply>;
  completeStructured<T>(
    messages: ChatMessage[],
    output: StructuredOutputSpec<T>,
    options?: CompletionOptions
  ): Promise<T>;
  completeWithTools(
    messages: ChatMessage[],
    tools: LlmToolSchema[],
    options?: CompletionOptions
  ): Promise<ToolTurnReply>;
}

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pull the JSON object out of a model reply and validate it.
 */
export function parseStructuredContent<T>(text: string, output: StructuredOutputSpec<T>): T {
  const fenced = text.match(FENCED_JSON);
  const body = (fenced?.[1] ?? text).trim();
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new MalformedModelOutputError(`${output.name}: reply contains no JSON object`, text);
  }

  let candidate: unknown;
  try {
    candidate = JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    throw new MalformedModelOutputError(
      `${output.name}: reply is not valid JSON (${describeError(error)})`,
      text
    );
  }

  const result = output.schema.safeParse(candidate);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ');
    throw new MalformedModelOutputError(
      `${output.name}: reply does not match schema (${summary})`,
      text,
      result.error.issues
    );
  }
  return result.data;
}

export function structuredOutputInstruction<T>(output: StructuredOutputSpec<T>): string {
  const jsonSchema = zodToJsonSchema(output.schema, { target: 'openApi3', $refStrategy: 'none' });
  return [
    `Respond with ONLY a JSON object describing a ${output.name}.`,
    `It must conform to this JSON schema: ${JSON.stringify(jsonSchema)}`,
  ].join('\n');
}

const ToolArgumentsSchema = z.record(z.unknown());

function parseToolArguments(
  raw: string,
  toolName: string,
  logger: LoggerLike
): Record<string, unknown> {
  if (!raw.trim()) {
    return {};
  }
  try {
    const parsed = ToolArgumentsSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
  } catch {
    // reported below
  }
  logger.warn(`Discarding unparseable arguments for tool call ${toolName}: ${raw.slice(0, 200)}`);
  return {};
}

export function toOpenAiMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'tool':
        return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: message.content };
    }
  });
}

function toOpenAiTools(tools: LlmToolSchema[]): ChatCompletionTool[] {
  return tools.map((tool): ChatCompletionTool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

/**
 * The slice of the OpenAI client the gateway uses.
 */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAiGatewayOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  retries: number;
  logger?: LoggerLike;
  retryBaseDelayMs?: number;
}

/**
 * Gateway backed by any OpenAI-compatible chat completions endpoint.
 */
export class OpenAiGateway implements LlmGateway {
  private readonly logger: LoggerLike;

  constructor(
    private readonly completions: ChatCompletionsApi,
    private readonly options: OpenAiGatewayOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get model(): string {
    return this.options.model;
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<TextReply> {
    const completion = await this.create(messages, options);
    const message = completion.choices[0]?.message;
    if (!message || typeof message.content !== 'string') {
      throw new MalformedModelOutputError('completion has no text content', JSON.stringify(completion));
    }
    return { content: message.content };
  }

  async completeStructured<T>(
    messages: ChatMessage[],
    output: StructuredOutputSpec<T>,
    options?: CompletionOptions
  ): Promise<T> {
    const withInstruction: ChatMessage[] = [
      ...messages,
      { role: 'system', content: structuredOutputInstruction(output) },
    ];
    const completion = await this.create(withInstruction, options, {
      response_format: { type: 'json_object' },
    });
    const content = completion.choices[0]?.message?.content ?? '';
    return parseStructuredContent(content, output);
  }

  async completeWithTools(
    messages: ChatMessage[],
    tools: LlmToolSchema[],
    options?: CompletionOptions
  ): Promise<ToolTurnReply> {
    const completion = await this.create(
      messages,
      options,
      tools.length > 0 ? { tools: toOpenAiTools(tools), tool_choice: 'auto' } : {}
    );
    const message = completion.choices[0]?.message;
    if (!message) {
      throw new MalformedModelOutputError('completion has no choices', JSON.stringify(completion));
    }
    const toolCalls = (message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments, call.function.name, this.logger),
    }));
    return { content: message.content ?? '', toolCalls };
  }

  private async create(
    messages: ChatMessage[],
    options: CompletionOptions | undefined,
    extra: Partial<ChatCompletionCreateParamsNonStreaming> = {}
  ): Promise<ChatCompletion> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.options.model,
      messages: toOpenAiMessages(messages),
      temperature: options?.temperature ?? this.options.temperature,
      max_tokens: options?.maxTokens ?? this.options.maxTokens,
      ...extra,
      stream: false,
    };

    const baseDelayMs = this.options.retryBaseDelayMs ?? 500;
    try {
      return await retryWithBackoff(() => this.completions.create(body), {
        retries: this.options.retries,
        baseDelayMs,
        maxDelayMs: 8_000,
        jitterMs: Math.floor(baseDelayMs / 2),
        isRetryable: (error) => classifyGatewayFailure(error).classification === 'retryable',
        onRetry: ({ attempt, retriesLeft, delayMs, error }) => {
          this.logger.warn(
            `Model call failed (attempt ${attempt}, ${retriesLeft} left, retry in ${delayMs}ms): ${describeError(error)}`
          );
        },
      });
    } catch (error) {
      if (error instanceof GatewayError || error instanceof MalformedModelOutputError) {
        throw error;
      }
      throw new GatewayError(`Model call failed: ${describeError(error)}`, {
        retryable: classifyGatewayFailure(error).classification === 'retryable',
        cause: error,
      });
    }
  }
}

/**
 * Build the gateway from config. The API key comes from the env var named in `agent.apiKeyEnv`.
 */
export function createLlmGateway(config: AssetPilotConfig, logger?: LoggerLike): OpenAiGateway {
  const apiKey = process.env[config.agent.apiKeyEnv];
  if (!apiKey) {
    throw new GatewayError(
      `${config.agent.apiKeyEnv} environment variable is required to reach the language model`
    );
  }
  const client = new OpenAI({
    apiKey,
    baseURL: config.agent.baseUrl,
    timeout: config.agent.timeoutMs,
    maxRetries: 0,
  });
  return new OpenAiGateway(
    { create: (body) => client.chat.completions.create(body) },
    {
      model: config.agent.model,
      temperature: config.agent.temperature,
      maxTokens: config.agent.maxTokens,
      retries: config.agent.retries,
      logger,
    }
  );
}

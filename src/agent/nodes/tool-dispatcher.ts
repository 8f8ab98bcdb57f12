/**
 * Tool-Dispatcher node
 *
 * Reactive loop: the model either answers or asks for tools; tool observations are fed
 * back and the model goes again. Ends on the first tool-free reply, after
 * `maxToolIterations` rounds with one forced final call, or on a gateway failure.
 */

import { ToolNotFoundError, describeError } from '../../core/errors.js';
import type { ChatMessage, ToolCallRequest } from '../../core/llm.js';
import type { NodeContext } from '../graph/context.js';
import { activeMessage } from '../graph/state.js';
import { DISPATCH_ERROR_KEY, FINAL_RESPONSE_KEY, type TurnState } from '../graph/types.js';
import { buildPromptMessages } from './messages.js';

async function runToolCall(
  call: ToolCallRequest,
  state: TurnState,
  ctx: NodeContext
): Promise<ChatMessage> {
  if (!ctx.tools.has(call.name)) {
    ctx.logger.warn(`Model requested unknown tool ${call.name}`);
    return { role: 'tool', content: `Tool ${call.name} not found`, toolCallId: call.id };
  }

  try {
    const observation = await ctx.tools.execute(call.name, call.arguments, ctx.toolContext);
    state.toolResults.set(call.name, observation);
    ctx.logger.debug(`Tool ${call.name} returned ${observation.length} chars`);
    return { role: 'tool', content: observation, toolCallId: call.id };
  } catch (error) {
    if (error instanceof ToolNotFoundError) {
      return { role: 'tool', content: error.message, toolCallId: call.id };
    }
    ctx.logger.error(`Tool ${call.name} failed: ${describeError(error)}`);
    return {
      role: 'tool',
      content: `Error executing ${call.name}: ${describeError(error)}`,
      toolCallId: call.id,
    };
  }
}

export async function runToolDispatcher(state: TurnState, ctx: NodeContext): Promise<void> {
  const { gateway, logger, options } = ctx;
  const messages = buildPromptMessages({
    system: ctx.prompts.toolDispatcher,
    userMessage: activeMessage(state),
    history: ctx.history.last(options.historyLimit),
  });
  const tools = ctx.tools.getLlmSchemas();

  try {
    for (let iteration = 1; iteration <= options.maxToolIterations; iteration++) {
      state.toolLoopIterations = iteration;
      const reply = await gateway.completeWithTools(messages, tools);

      if (reply.toolCalls.length === 0) {
        logger.info(`Tool loop finished after ${iteration} iteration(s)`);
        state.toolResults.set(FINAL_RESPONSE_KEY, reply.content);
        return;
      }

      logger.info(
        `Iteration ${iteration}: model requested ${reply.toolCalls.map((call) => call.name).join(', ')}`
      );
      messages.push({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls });

      for (const call of reply.toolCalls) {
        messages.push(await runToolCall(call, state, ctx));
      }
    }

    logger.warn(
      `Reached max iterations (${options.maxToolIterations}); asking the model for a final answer`
    );
    messages.push({ role: 'user', content: ctx.prompts.finalAnswerNudge });
    const final = await gateway.complete(messages);
    state.toolLoopIterations += 1;
    state.toolResults.set(FINAL_RESPONSE_KEY, final.content);
  } catch (error) {
    logger.error(`Tool dispatch failed: ${describeError(error)}`);
    state.toolResults.set(
      DISPATCH_ERROR_KEY,
      `I encountered an error while processing your request: ${describeError(error)}`
    );
  }
}

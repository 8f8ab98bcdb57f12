/**
 * Turn graph types
 *
 * The record that flows through the graph for one user message, plus the
 * structured outputs the classifier and rewriter request from the model.
 */

import { z } from 'zod';

export const INTENTS = ['tool_required', 'conversation', 'help', 'unclear', 'error'] as const;

export type Intent = (typeof INTENTS)[number];

export const DecisionSchema = z.object({
  intent: z.enum(INTENTS).describe('The determined intent of the user message'),
  confidence: z.number().min(0).max(1).describe('Confidence (0.0-1.0) in the intent determination'),
  needs_rewrite: z.boolean().describe('Whether the message needs clarification/rewriting'),
  reasoning: z.string().describe('Brief explanation of the decision'),
});

export type Decision = z.infer<typeof DecisionSchema>;

export const RewriteResultSchema = z.object({
  rewritten_message: z.string().min(1).describe('The clarified and rewritten user message'),
  clarifications_added: z
    .array(z.string())
    .default([])
    .describe('List of clarifications that were added'),
  confidence: z.number().min(0).max(1).describe('Confidence in the rewrite quality'),
});

export type RewriteResult = z.infer<typeof RewriteResultSchema>;

/** Reserved `toolResults` keys that are not tool names. */
export const FINAL_RESPONSE_KEY = 'llm_final_response';
export const DISPATCH_ERROR_KEY = 'error';

export type NodeId = 'classifier' | 'rewriter' | 'tool_dispatcher' | 'responder' | 'terminal';

export interface TurnMetadata {
  intent: Intent | 'unknown';
  confidence: number;
  tools_used: string[];
  iterations: number;
  was_rewritten: boolean;
  /** Tool-loop rounds the dispatcher ran, when it ran. */
  tool_iterations?: number;
  error?: string;
  type?: string;
}

export interface TurnState {
  readonly originalMessage: string;
  currentMessage: string;
  classification?: Decision;
  rewrite?: RewriteResult;
  /** Insertion-ordered: tool name or sentinel key -> observation text. */
  toolResults: Map<string, string>;
  finalResponse: string;
  metadata?: TurnMetadata;
  /** Classifier visits. */
  iterationCount: number;
  /** Model invocations made by the dispatcher loop, including the forced final call. */
  toolLoopIterations: number;
  /** Node visits, in order. */
  trail: NodeId[];
}

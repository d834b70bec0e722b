/**
 * OpenAI runner.
 * Sends a task to a chat-completion model. Each call is a fresh single-turn
 * conversation, tagged with the session and trace it belongs to.
 */

import OpenAI from 'openai';
import type { IBackendRunner } from './IBackendRunner.js';
import type { RunnerOutput, SessionId, TraceId } from '../types/index.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_SYSTEM_PROMPT =
  'You are an isolated task runner. Complete the task and reply with the result only.';

export interface OpenAIRunnerOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  systemPrompt?: string;
  /** Injected client, for tests. */
  client?: OpenAI;
}

export class OpenAIRunner implements IBackendRunner {
  readonly kind = 'openai';
  readonly requiresNetwork = true;
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private systemPrompt: string;

  constructor(opts?: OpenAIRunnerOptions) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.systemPrompt = opts?.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  async executeIsolated(input: string, sessionId: SessionId, traceId: TraceId): Promise<RunnerOutput> {
    const started = Date.now();
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        user: `session:${sessionId}`,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: input },
        ],
      },
      {
        headers: {
          'X-Session-Id': sessionId,
          'X-Trace-Id': traceId,
        },
      }
    );

    const choice = completion.choices[0];
    const content = choice?.message.content ?? '';
    const finishReason = choice?.finish_reason ?? 'none';

    return {
      ok: finishReason === 'stop',
      stdout: content,
      stderr: finishReason === 'stop' ? '' : `finish_reason: ${finishReason}`,
      metrics: {
        model: completion.model,
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        durationMs: Date.now() - started,
      },
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch (err) {
      if (err instanceof OpenAI.APIError) return false;
      throw err;
    }
  }
}

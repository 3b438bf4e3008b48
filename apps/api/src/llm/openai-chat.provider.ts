import { Inject, Injectable, Logger } from '@nestjs/common';
import { FaultKind, JsonObject } from '@nextgen/shared';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { failed, fault, Fault, succeeded, TaskOutcome } from '../common/errors/fault';
import { LlmProvider } from './llm-provider';

/** Longest slice of an upstream error body echoed into a fault detail */
const MAX_ERROR_BODY_CHARS = 500;

type ChatMessage = { role: 'system' | 'user'; content: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Values produced by JSON.parse are JSON, so any plain object is a JsonObject.
 */
function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value);
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Pull the first choice's message content out of a Chat Completions body.
 */
export function extractCompletionContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) {
    return undefined;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;

  const content = first.message.content;
  if (typeof content !== 'string' || content.trim().length === 0) return undefined;
  return content.trim();
}

/**
 * Turn completion content into a task result. A JSON object (optionally in a
 * ```json fence) is returned as-is; anything else becomes { result: content },
 * with the fence removed.
 */
export function toTaskResult(content: string): JsonObject {
  const fenced = content.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  const candidate = fenced ? fenced[1] : content;

  const parsed = parseJson(candidate);
  if (parsed.ok && isJsonObject(parsed.value)) return parsed.value;
  return { result: candidate };
}

export function buildMessages(taskName: string, payload: JsonObject): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        `You are the NextGen task engine. Perform the "${taskName}" task on the JSON ` +
        'payload supplied by the user. Reply with a single JSON object and nothing else.',
    },
    { role: 'user', content: JSON.stringify(payload) },
  ];
}

/**
 * OpenAiChatProvider
 *
 * Calls an OpenAI-compatible Chat Completions endpoint with Node 20 built-in fetch.
 * One attempt per call; the deadline is enforced with an AbortController.
 */
@Injectable()
export class OpenAiChatProvider implements LlmProvider {
  private readonly logger = new Logger(OpenAiChatProvider.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    if (!config.llm.apiKey) {
      this.logger.warn('LLM_API_KEY not set. Requests are sent without an Authorization header.');
    }
  }

  async complete(taskName: string, payload: JsonObject): Promise<TaskOutcome> {
    const { apiUrl, apiKey, model, timeoutMs } = this.config.llm;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (apiKey) {
      headers['Authorization'] = `Bearer ${apiKey}`;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let status: number;
    let text: string;
    try {
      const response = await fetch(apiUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model, messages: buildMessages(taskName, payload) }),
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const transportFault = this.classifyTransportError(error, timeoutMs);
      if (!transportFault) throw error;
      return failed(transportFault);
    } finally {
      clearTimeout(timer);
    }

    if (status < 200 || status >= 300) {
      return failed(
        fault(
          FaultKind.LLM_PROVIDER,
          `LLM provider returned ${status}: ${text.slice(0, MAX_ERROR_BODY_CHARS)}`,
        ),
      );
    }

    const body = parseJson(text);
    if (!body.ok) {
      return failed(fault(FaultKind.LLM_PROVIDER, 'LLM provider returned a malformed response'));
    }

    const content = extractCompletionContent(body.value);
    if (content === undefined) {
      return failed(fault(FaultKind.LLM_PROVIDER, 'LLM provider returned no content'));
    }

    this.logger.debug(`LLM response received for task "${taskName}"`);
    return succeeded(toTaskResult(content));
  }

  /**
   * Map a rejected fetch to a Network or Timeout fault.
   * Returns undefined for errors that are neither.
   */
  private classifyTransportError(error: unknown, timeoutMs: number): Fault | undefined {
    if (isAbortError(error)) {
      return fault(FaultKind.TIMEOUT, `LLM provider did not respond within ${timeoutMs}ms`);
    }
    // undici rejects with TypeError('fetch failed') and puts the socket error in `cause`
    if (error instanceof TypeError) {
      const cause = error.cause instanceof Error ? error.cause.message : error.message;
      return fault(FaultKind.NETWORK, `LLM provider is unreachable: ${cause}`);
    }
    return undefined;
  }
}

import type { TokenUsage } from '@pagescribe/model';

/**
 * The parts of a generateText result the normalizer reads. Kept structural so
 * OpenAI-compatible providers with unusual response shapes still fit.
 */
export interface VisionResponseLike {
  text?: unknown;
  content?: unknown;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
  response?: {
    body?: unknown;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function joinTextSegments(segments: unknown[]): string {
  return segments
    .map((segment) => (isRecord(segment) ? nonEmptyString(segment.text) : ''))
    .filter((text): text is string => text !== undefined)
    .join('');
}

function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') {
    return body;
  }
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

/**
 * Text carried by a raw chat-completions style body: `choices[0].message
 * .content` (string or list of `{text}` segments), then `output_text`.
 * A body that is not JSON is returned as is.
 */
export function extractEnvelopeText(body: unknown): string {
  const parsed = parseBody(body);
  if (typeof parsed === 'string') {
    return parsed;
  }
  if (!isRecord(parsed)) {
    return '';
  }

  const choices = parsed.choices;
  const firstChoice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (isRecord(firstChoice)) {
    const message = firstChoice.message;
    if (isRecord(message)) {
      if (Array.isArray(message.content)) {
        const joined = joinTextSegments(message.content);
        if (joined) {
          return joined;
        }
      }
      const content = nonEmptyString(message.content);
      if (content) {
        return content;
      }
    }
  }

  return nonEmptyString(parsed.output_text) ?? '';
}

/**
 * Model output text: `text`, then joined text parts of `content`, then the
 * raw response body, else ''.
 */
export function extractResponseText(result: VisionResponseLike): string {
  const text = nonEmptyString(result.text);
  if (text) {
    return text;
  }

  if (Array.isArray(result.content)) {
    const joined = joinTextSegments(
      result.content.filter(
        (part) => isRecord(part) && (part.type ?? 'text') === 'text',
      ),
    );
    if (joined) {
      return joined;
    }
  }

  return extractEnvelopeText(result.response?.body);
}

function count(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? Math.floor(value)
    : undefined;
}

/**
 * Token counts with absent fields as 0 and an absent total derived from the
 * other two. When the SDK reports nothing, the body's `usage`
 * (`prompt_tokens`/`completion_tokens`/`total_tokens`) is used instead.
 */
export function normalizeUsage(result: VisionResponseLike): TokenUsage {
  let prompt = count(result.usage?.inputTokens);
  let completion = count(result.usage?.outputTokens);
  let total = count(result.usage?.totalTokens);

  if (prompt === undefined && completion === undefined && total === undefined) {
    const body = parseBody(result.response?.body);
    if (isRecord(body) && isRecord(body.usage)) {
      prompt = count(body.usage.prompt_tokens);
      completion = count(body.usage.completion_tokens);
      total = count(body.usage.total_tokens);
    }
  }

  const promptTokens = prompt ?? 0;
  const completionTokens = completion ?? 0;
  return {
    prompt: promptTokens,
    completion: completionTokens,
    total: total ?? promptTokens + completionTokens,
  };
}

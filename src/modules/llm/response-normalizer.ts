// modules/llm/response-normalizer.ts
import { isRecord } from '../../common/utils/json.util';

/**
 * One way a service version may carry the answer text in a successful body.
 */
export interface ExtractionRule {
  name: string;
  extract(body: Record<string, unknown>): unknown;
}

export type NormalizedResponse = { ok: true; text: string; rule: string } | { ok: false; reason: string };

const firstChoice = (body: Record<string, unknown>): Record<string, unknown> | undefined => {
  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) return undefined;
  const [choice] = choices;
  return isRecord(choice) ? choice : undefined;
};

const field =
  (key: string): ExtractionRule['extract'] =>
  (body) =>
    body[key];

/**
 * Tried in order; the first rule yielding a non-empty string wins.
 * New response shapes are added here, not in the gateway.
 */
export const RESPONSE_EXTRACTION_RULES: readonly ExtractionRule[] = [
  {
    name: 'choices[0].message.content',
    extract: (body) => {
      const message = firstChoice(body)?.message;
      return isRecord(message) ? message.content : undefined;
    },
  },
  { name: 'choices[0].text', extract: (body) => firstChoice(body)?.text },
  { name: 'response', extract: field('response') },
  { name: 'output', extract: field('output') },
  { name: 'text', extract: field('text') },
  { name: 'content', extract: field('content') },
  { name: 'result', extract: field('result') },
  { name: 'generated_text', extract: field('generated_text') },
];

export function normalizeResponse(
  body: unknown,
  rules: readonly ExtractionRule[] = RESPONSE_EXTRACTION_RULES,
): NormalizedResponse {
  if (!isRecord(body)) {
    return { ok: false, reason: 'Response body is not a JSON object' };
  }

  for (const rule of rules) {
    const value = rule.extract(body);
    if (typeof value === 'string' && value.trim().length > 0) {
      return { ok: true, text: value.trim(), rule: rule.name };
    }
  }

  return { ok: false, reason: 'Could not extract response text from API response' };
}

/**
 * Best-effort human-readable message from an error body.
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;

  const candidates: unknown[] = [
    body.message,
    isRecord(body.error) ? body.error.message : body.error,
    body.detail,
    body.title,
  ];

  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.trim().length > 0) return candidate.trim();
  }
  return undefined;
}

import { z } from 'zod';
import type { JsonSchema, ProviderIdentity, ResponseFormatDirective } from '../providers/types.js';
import { JSON_FORMAT } from '../providers/types.js';
import { parseJsonWith, type ParseResult } from './parse.js';

export const VERDICT_RESULTS = ['PASS', 'FAIL'] as const;
export type VerdictResult = (typeof VERDICT_RESULTS)[number];

export interface EvaluationVerdict {
  readonly result: VerdictResult;
  readonly explanation: string;
  readonly referenceAnswer: string;
}

const requiredText = z.string().trim().min(1, 'must be a non-empty string');

/**
 * Shape the model is asked to produce. Used for the JSON Schema handed to
 * constrained decoding.
 */
export const verdictWireSchema = z.object({
  result: z.enum(VERDICT_RESULTS).describe('PASS or FAIL'),
  explanation: z.string().min(1).describe('A concise explanation of why it passed or failed.'),
  answer: z
    .string()
    .min(1)
    .describe("The correct answer to the question, independent of the user's response."),
});

/** Validation side: accepts any casing of the result and normalizes it. */
const verdictInputSchema = z.object({
  result: z
    .string()
    .trim()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(VERDICT_RESULTS, { error: 'must be PASS or FAIL' })),
  explanation: requiredText,
  answer: requiredText,
});

export const VERDICT_JSON_SCHEMA: JsonSchema = { ...z.toJSONSchema(verdictWireSchema) };

export function parseVerdict(raw: string): ParseResult<EvaluationVerdict> {
  const parsed = parseJsonWith(raw, verdictInputSchema, 'evaluation');
  if (!parsed.ok) {
    return parsed;
  }
  return {
    ok: true,
    value: Object.freeze({
      result: parsed.value.result,
      explanation: parsed.value.explanation,
      referenceAnswer: parsed.value.answer,
    }),
  };
}

/**
 * Local models can be pinned to the exact schema; the cloud API only takes
 * "some JSON object".
 */
export function verdictFormat(identity: ProviderIdentity): ResponseFormatDirective {
  return identity === 'LOCAL'
    ? { kind: 'schema', name: 'evaluation_verdict', schema: VERDICT_JSON_SCHEMA }
    : JSON_FORMAT;
}

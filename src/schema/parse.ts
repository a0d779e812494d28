import type { z } from 'zod';
import { MalformedResponseError, errorMessage } from '../errors.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: MalformedResponseError };

/**
 * Strip a surrounding markdown code fence, which chat models add even when
 * asked for bare JSON.
 */
export function unwrapJsonText(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : trimmed;
}

/**
 * Parse raw model text as JSON and validate it against `schema`. Never
 * throws: every failure comes back as a MalformedResponseError value.
 */
export function parseJsonWith<S extends z.ZodType>(
  raw: string,
  schema: S,
  label: string
): ParseResult<z.output<S>> {
  let data: unknown;
  try {
    data = JSON.parse(unwrapJsonText(raw));
  } catch (e) {
    const issue = `response is not valid JSON: ${errorMessage(e)}`;
    return { ok: false, error: new MalformedResponseError(`Malformed ${label}: ${issue}`, [issue], [], { cause: e }) };
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    const fields = [
      ...new Set(result.error.issues.map(issue => String(issue.path[0] ?? '')).filter(Boolean)),
    ];
    const summary = fields.length > 0 ? `missing or invalid ${fields.join(', ')}` : issues.join('; ');
    return {
      ok: false,
      error: new MalformedResponseError(`Malformed ${label}: ${summary}`, issues, fields, { cause: result.error }),
    };
  }

  return { ok: true, value: result.data };
}

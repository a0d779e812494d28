import { z } from 'zod';
import { parseJsonWith, type ParseResult } from './parse.js';

const questionSchema = z.object({
  question: z.string().trim().min(1, 'must be a non-empty string'),
});

export function parseQuestion(raw: string): ParseResult<string> {
  const parsed = parseJsonWith(raw, questionSchema, 'question');
  return parsed.ok ? { ok: true, value: parsed.value.question } : parsed;
}

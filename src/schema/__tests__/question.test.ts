import { describe, expect, it } from 'vitest';
import { parseQuestion } from '../question.js';
import { unwrapJsonText } from '../parse.js';

describe('parseQuestion', () => {
  it('should return the question text', () => {
    expect(parseQuestion('{"question":"Why does CPython need a GIL?"}')).toEqual({
      ok: true,
      value: 'Why does CPython need a GIL?',
    });
  });

  it('should fail when the question field is absent', () => {
    const parsed = parseQuestion('{"q":"Why?"}');

    expect(parsed.ok).toBe(false);
    expect(!parsed.ok && parsed.error.fields).toEqual(['question']);
  });

  it('should fail on an empty question', () => {
    expect(parseQuestion('{"question":""}').ok).toBe(false);
  });

  it('should fail on plain text', () => {
    const parsed = parseQuestion('What is a decorator?');

    expect(!parsed.ok && parsed.error.message).toMatch(/^Malformed question: response is not valid JSON/);
  });
});

describe('unwrapJsonText', () => {
  it('should strip a json code fence', () => {
    expect(unwrapJsonText('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should strip a bare code fence', () => {
    expect(unwrapJsonText('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should leave unfenced text trimmed', () => {
    expect(unwrapJsonText('  {"a":1}\n')).toBe('{"a":1}');
  });
});

import { describe, expect, it } from 'vitest';
import { MalformedResponseError } from '../../errors.js';
import { parseVerdict, verdictFormat, VERDICT_JSON_SCHEMA } from '../verdict.js';

function failureOf(raw: string): MalformedResponseError {
  const parsed = parseVerdict(raw);
  if (parsed.ok) {
    throw new Error(`expected a validation failure for ${raw}`);
  }
  return parsed.error;
}

describe('parseVerdict', () => {
  it('should return the verdict fields exactly', () => {
    const parsed = parseVerdict('{"result":"PASS","explanation":"Correct.","answer":"The GIL."}');

    expect(parsed).toEqual({
      ok: true,
      value: { result: 'PASS', explanation: 'Correct.', referenceAnswer: 'The GIL.' },
    });
  });

  it('should accept a FAIL verdict', () => {
    const parsed = parseVerdict(JSON.stringify({
      result: 'FAIL',
      explanation: 'The answer confuses inheritance with composition.',
      answer: 'Inheritance is an is-a relationship between classes.',
    }));

    expect(parsed.ok && parsed.value.result).toBe('FAIL');
  });

  it('should normalize the result case', () => {
    const lower = parseVerdict('{"result":"pass","explanation":"ok","answer":"x"}');
    const padded = parseVerdict('{"result":" Fail ","explanation":"no","answer":"y"}');

    expect(lower.ok && lower.value.result).toBe('PASS');
    expect(padded.ok && padded.value.result).toBe('FAIL');
  });

  it('should return a frozen verdict', () => {
    const parsed = parseVerdict('{"result":"PASS","explanation":"ok","answer":"x"}');

    expect(parsed.ok && Object.isFrozen(parsed.value)).toBe(true);
  });

  it('should ignore extra fields', () => {
    const parsed = parseVerdict('{"result":"PASS","explanation":"ok","answer":"x","score":9}');

    expect(parsed).toEqual({
      ok: true,
      value: { result: 'PASS', explanation: 'ok', referenceAnswer: 'x' },
    });
  });

  it('should unwrap a fenced JSON block', () => {
    const parsed = parseVerdict('```json\n{"result":"FAIL","explanation":"no","answer":"y"}\n```');

    expect(parsed.ok && parsed.value.referenceAnswer).toBe('y');
  });

  it.each([
    ['result', '{"explanation":"Some explanation.","answer":"Some answer."}'],
    ['explanation', '{"result":"PASS","answer":"Some answer."}'],
    ['answer', '{"result":"PASS","explanation":"Some explanation."}'],
  ])('should fail when %s is missing', (field, raw) => {
    const error = failureOf(raw);

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error.code).toBe('MALFORMED_RESPONSE');
    expect(error.fields).toEqual([field]);
  });

  it('should name every field when all are missing', () => {
    expect([...failureOf('{}').fields].sort()).toEqual(['answer', 'explanation', 'result']);
  });

  it('should fail when only the result is present', () => {
    const error = failureOf('{"result":"PASS"}');

    expect([...error.fields].sort()).toEqual(['answer', 'explanation']);
    expect(error.message).toContain('Malformed evaluation');
  });

  it('should reject a result other than PASS or FAIL', () => {
    expect(failureOf('{"result":"MAYBE","explanation":"hm","answer":"x"}').fields).toEqual(['result']);
  });

  it('should reject whitespace-only text fields', () => {
    expect(failureOf('{"result":"PASS","explanation":"   ","answer":"x"}').fields).toEqual(['explanation']);
  });

  it('should reject non-string fields', () => {
    expect(failureOf('{"result":"PASS","explanation":"ok","answer":42}').fields).toEqual(['answer']);
  });

  it('should fail without throwing on text that is not JSON', () => {
    const error = failureOf('Sure! The answer is correct.');

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error.fields).toEqual([]);
    expect(error.issues[0]).toMatch(/^response is not valid JSON/);
  });

  it('should fail on JSON that is not an object', () => {
    expect(parseVerdict('["PASS"]').ok).toBe(false);
    expect(parseVerdict('null').ok).toBe(false);
  });
});

describe('VERDICT_JSON_SCHEMA', () => {
  it('should describe the wire shape with all fields required', () => {
    expect(VERDICT_JSON_SCHEMA).toMatchObject({
      type: 'object',
      required: ['result', 'explanation', 'answer'],
      properties: {
        result: { type: 'string', enum: ['PASS', 'FAIL'] },
        explanation: { type: 'string' },
        answer: { type: 'string' },
      },
    });
  });
});

describe('verdictFormat', () => {
  it('should pin the schema for the local provider', () => {
    expect(verdictFormat('LOCAL')).toEqual({
      kind: 'schema',
      name: 'evaluation_verdict',
      schema: VERDICT_JSON_SCHEMA,
    });
  });

  it('should ask the cloud provider for plain JSON', () => {
    expect(verdictFormat('CLOUD')).toEqual({ kind: 'json' });
  });
});

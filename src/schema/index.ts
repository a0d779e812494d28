export {
  parseVerdict,
  verdictFormat,
  verdictWireSchema,
  VERDICT_JSON_SCHEMA,
  VERDICT_RESULTS,
} from './verdict.js';
export type { EvaluationVerdict, VerdictResult } from './verdict.js';
export { parseQuestion } from './question.js';
export { parseJsonWith, unwrapJsonText } from './parse.js';
export type { ParseResult } from './parse.js';

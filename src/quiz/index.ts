export { QuizOrchestrator, toDisplayError } from './orchestrator.js';
export type {
  QuizOrchestratorOptions,
  QuestionOutcome,
  EvaluationOutcome,
  DisplayError,
} from './orchestrator.js';
export {
  buildQuestionConversation,
  buildEvaluationConversation,
  fillTemplate,
  clearPromptCache,
} from './prompt-builder.js';

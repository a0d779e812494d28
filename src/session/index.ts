export { EventChannel } from './channel.js';
export { QuizSession } from './quiz-session.js';
export type { SessionPhase, SessionState, SessionEvent, QuizSessionDeps } from './quiz-session.js';

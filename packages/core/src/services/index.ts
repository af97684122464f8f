export { ParameterStore } from './parameter-store.service';
export { ReviewService } from './review.service';
export type { ReviewOutcome, ReviewRequestInput, ReviewServiceDeps } from './review.service';
export { SessionRegistry } from './session-registry';
export type { ActiveSession } from './session-registry';
export {
  DEFAULT_SESSION_SETTINGS,
  SessionOrchestrator,
} from './session-orchestrator.service';
export type {
  AnswerOutcome,
  SessionDefaults,
  SessionOrchestratorDeps,
  SessionStart,
  StartSessionInput,
} from './session-orchestrator.service';
export { CardService, INITIAL_DIFFICULTY, INITIAL_STABILITY } from './card.service';
export {
  EASY_RESPONSE_MS,
  GOOD_RESPONSE_MS,
  difficultyLabel,
  evaluateAnswer,
  inferRating,
} from './answer-evaluation';

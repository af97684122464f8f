export type {
  CardRepository,
  DueQueryFilters,
  ParameterRepository,
  ReadOnlySchedulingView,
  ReviewHistoryRepository,
  SchedulingStore,
  SessionRecordRepository,
  StoredLearnerParameters,
  StoredParameters,
  StudyItemRepository,
} from './types';

export {
  SqliteCardRepository,
  SqliteParameterRepository,
  SqliteReviewHistoryRepository,
  SqliteSchedulingStore,
  SqliteSessionRecordRepository,
  SqliteStudyItemRepository,
} from './sqlite-repository';

export { createReadOnlyView } from './read-only-view';
export { SCHEMA_SQL } from './schema';

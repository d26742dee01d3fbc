export { DriftEngine, DEFAULT_DRIFT_OPTIONS, humanLabel, type DriftOptions } from './drift.js';
export {
  MemoryFeedbackStore,
  JsonlFeedbackStore,
  FeedbackInputSchema,
  type FeedbackStore
} from './store.js';

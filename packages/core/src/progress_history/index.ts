export type { ProgressHistoryStore, ProgressHistoryFile } from './progress_history.types';
export { ProgressHistory, appendSample, isProgressSample, HISTORY_LIMIT } from './progress_history';

export { FsProgressHistoryStore, HISTORY_FILE_NAME } from './fs_progress_history_store';

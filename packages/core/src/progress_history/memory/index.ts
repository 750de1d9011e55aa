export { MemoryProgressHistoryStore } from './memory_progress_history_store';

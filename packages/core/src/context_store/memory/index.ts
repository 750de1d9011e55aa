export { MemoryContextStore } from './memory_context_store';

export type { ActiveFeature, ContextStore } from './context_store.types';
export {
  ACTIVE_FEATURE_HEADING,
  CONTEXT_FILE_NAME,
  DEFAULT_CONTEXT_DOCUMENT,
  parseActiveFeature,
  renderActiveFeature,
  updateActiveFeature,
} from './context_document';

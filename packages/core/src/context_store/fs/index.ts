export { FsContextStore } from './fs_context_store';

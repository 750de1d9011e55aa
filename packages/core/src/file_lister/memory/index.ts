export { MemoryFileLister } from './memory_file_lister';
export type { MemoryFileListerOptions } from '../file_lister.types';

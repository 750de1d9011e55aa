export { MemoryFileWriter } from './memory_file_writer';

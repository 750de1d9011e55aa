export type { FileWriter, FsFileWriterOptions } from './file_writer';
export { FileWriterError } from './file_writer.errors';
export type { FileWriterErrorCode } from './file_writer.errors';

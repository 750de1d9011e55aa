export { FsFileWriter } from './fs_file_writer';
export type { FsFileWriterOptions } from '../file_writer';

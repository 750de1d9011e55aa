export { MemoryGitModule } from './memory_git_module';
export type { MemoryGitModuleOptions } from './memory_git_module';

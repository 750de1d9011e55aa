export type {
  InitProjectOptions,
  IProjectInitializer,
  ProjectInitializerDependencies,
  ProjectInitResult,
} from './project_initializer.types';
export { ProjectInitializer } from './project_initializer';

// Numbering
export * as Registry from "./artifact_registry";
export * as Allocator from "./id_allocator";
export * as IdGenerator from "./utils/id_generator";

// Progress
export * as Progress from "./progress_calculator";
export * as Tracker from "./progress_tracker";
export * as History from "./progress_history";

// Features and documents
export * as Features from "./feature_manager";
export * as Templates from "./template_provider";
export * as Validator from "./artifact_validator";
export * as Context from "./context_store";
export * as Project from "./project_initializer";

// Infrastructure
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as FileLister from "./file_lister";
export * as FileWriter from "./file_writer";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Errors from "./errors";

export {
  DirectoryProcessor,
  formatReport,
  SKIPPED_DIRECTORIES,
  PROJECT_DIRECTORIES,
  PROCESSED_MESSAGE,
  DRY_RUN_MESSAGE,
} from './DirectoryProcessor.js';
export type {
  BatchOptions,
  DirectoryProcessorOptions,
  ProcessFileOptions,
  FileOutcome,
  BatchReport,
} from './DirectoryProcessor.js';

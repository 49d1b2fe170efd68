export { PathResolver, pathResolver, withSuffix, tempOutputPath } from './lib/path-resolver';
export type { ResolvedTarget, ResolveResult, PrepareOptions } from './lib/path-resolver';
export {
  buildShrinkCommand,
  escapeOutputFile,
  formatCommandLine,
  GHOSTSCRIPT_SETTINGS,
} from './lib/ghostscript-command';
export type { ShrinkCommand, GhostscriptSettings } from './lib/ghostscript-command';
export { ShrinkRunner } from './lib/shrink-runner';
export type { ShrinkRunnerOptions } from './lib/shrink-runner';
export { ConfigLoader, configLoader } from './lib/config-loader';
export {
  placementModeFromOptions,
  DEFAULT_PLACEMENT_MODE,
  DEFAULT_SUFFIX,
} from './types/placement-mode';
export type { PlacementMode, PlacementOptions } from './types/placement-mode';
export type { GlobalConfig } from './types/global-config';
export { summarizeOutcomes, isFailure } from './types/shrink-result';
export type { FileOutcome, BatchReport } from './types/shrink-result';
export { runProcess, spawnExecutor } from './utils/process-utils';
export type { ProcessExecutor, ProcessResult } from './utils/process-utils';
export { Logger, createLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';

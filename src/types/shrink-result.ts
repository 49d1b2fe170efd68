export type ResolutionErrorKind =
  | 'naming-collision'
  | 'input-not-found'
  | 'directory-creation-failed';

export type EngineErrorKind =
  | 'engine-spawn-failed'
  | 'engine-exit'
  | 'replace-failed';

export interface ResolutionError {
  kind: ResolutionErrorKind;
  message: string;
}

export interface EngineError {
  kind: EngineErrorKind;
  message: string;
  exitCode?: number;       // Only for engine-exit with a numeric code
}

export type FileOutcome =
  | {
      status: 'succeeded';
      input: string;
      output: string;
      bytesBefore: number;
      bytesAfter: number;
    }
  | {
      status: 'dry-run';
      input: string;
      output: string;
      commandLine: string;
    }
  | {
      status: 'failed';
      input: string;
      output: string;
      error: EngineError;
    }
  | {
      status: 'resolution-error';
      input: string;
      output?: string;
      error: ResolutionError;
    };

export type FailedOutcome = Extract<FileOutcome, { status: 'failed' | 'resolution-error' }>;

export interface BatchReport {
  outcomes: FileOutcome[];   // In input order
  succeeded: number;
  dryRun: number;
  failures: FailedOutcome[];
}

export function isFailure(outcome: FileOutcome): outcome is FailedOutcome {
  return outcome.status === 'failed' || outcome.status === 'resolution-error';
}

export function summarizeOutcomes(outcomes: FileOutcome[]): BatchReport {
  return {
    outcomes,
    succeeded: outcomes.filter((o) => o.status === 'succeeded').length,
    dryRun: outcomes.filter((o) => o.status === 'dry-run').length,
    failures: outcomes.filter(isFailure),
  };
}

/**
 * Update report types
 *
 * An update pass produces one outcome per target instead of throwing, so a
 * single bad target never hides the results of its siblings.
 */

export type FailureStage = 'build' | 'swap';

export interface SyncFailure {
  stage: FailureStage;
  message: string;
  cause: unknown;
}

export type TargetOutcome =
  | { status: 'updated'; target: string; resource: string; released: boolean }
  | { status: 'skipped'; target: string; reason: 'unchanged' | 'unlinked' }
  | { status: 'failed'; target: string; failure: SyncFailure };

export interface UpdateReport {
  source: string;
  /** The source no longer exists; its cached state was forgotten */
  missing: boolean;
  outcomes: TargetOutcome[];
}

export function failuresOf(report: UpdateReport): Array<Extract<TargetOutcome, { status: 'failed' }>> {
  return report.outcomes.filter(
    (outcome): outcome is Extract<TargetOutcome, { status: 'failed' }> => outcome.status === 'failed'
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

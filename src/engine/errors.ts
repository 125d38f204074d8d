/**
 * Error taxonomy for the remediation engine.
 *
 * Each error carries a stable `reason` string that ends up in logs,
 * action records and operator notifications.
 */

export class EngineError extends Error {
  readonly reason: string;

  constructor(reason: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.reason = reason;
  }
}

/** Malformed alert payload. The alert is skipped; the batch continues. */
export class IngestionError extends EngineError {
  constructor(message: string) {
    super('invalid_alert', message);
  }
}

/** The diagnosis oracle did not answer in time. */
export class ClassificationTimeout extends EngineError {
  constructor(timeoutMs: number) {
    super('oracle_timeout', `Diagnosis oracle timed out after ${timeoutMs}ms`);
  }
}

export type ExecutionFailureReason = 'action_failed' | 'action_timeout' | 'manual_action_required';

export class ActionExecutionFailure extends EngineError {
  declare readonly reason: ExecutionFailureReason;

  constructor(reason: ExecutionFailureReason, message: string) {
    super(reason, message);
  }
}

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

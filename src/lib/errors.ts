export type RbdFailureReason = 'spawn' | 'exit' | 'timeout';

function excerpt(text: string, limit = 2000): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

/**
 * The rbd CLI could not be started, exited non-zero, or was killed at the scrape deadline.
 */
export class RbdExecError extends Error {
  readonly reason: RbdFailureReason;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    input: { reason: RbdFailureReason; args: readonly string[]; exitCode?: number | null; stderr?: string }
  ) {
    super(message);
    this.name = 'RbdExecError';
    this.reason = input.reason;
    this.args = input.args;
    this.exitCode = input.exitCode ?? null;
    this.stderr = excerpt(input.stderr ?? '');
  }
}

/**
 * Output that is not JSON, or JSON that does not have the shape we read.
 */
export class StatusDecodeError extends Error {
  constructor(subject: string, detail: string) {
    super(`decode ${subject}: ${detail}`);
    this.name = 'StatusDecodeError';
  }
}

/**
 * Valid image status whose declared mode has no matching stats object.
 */
export class ShapeMismatchError extends Error {
  constructor(image: string, mode: string, missing: string) {
    super(`image ${image} declares mode ${mode} but has no ${missing}`);
    this.name = 'ShapeMismatchError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

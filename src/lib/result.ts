/**
 * Outcome of a single migration step or check.
 */
export type StepResult<T = void> = StepSuccess<T> | StepFailure;

export interface StepSuccess<T> {
  ok: true;
  message: string;
  value: T;
}

export interface StepFailure {
  ok: false;
  message: string;
}

export function ok(message: string): StepSuccess<void> {
  return { ok: true, message, value: undefined };
}

export function okWith<T>(message: string, value: T): StepSuccess<T> {
  return { ok: true, message, value };
}

export function fail(message: string): StepFailure {
  return { ok: false, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

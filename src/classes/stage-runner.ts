import type { MigrationLogger } from '../lib/logger';
import { errorMessage, fail, ok, type StepResult } from '../lib/result';

/**
 * critical: a failure aborts the stage.
 * best-effort: a failure is logged as a warning and the stage goes on.
 */
export type StepPolicy = 'critical' | 'best-effort';

export interface MigrationStep<C> {
  name: string;
  policy: StepPolicy;
  run(context: C): Promise<StepResult<unknown>>;
}

/**
 * Run the steps of one stage in order. A thrown error aborts the stage
 * whatever the step's policy.
 */
export async function runSteps<C>(
  stage: string,
  steps: ReadonlyArray<MigrationStep<C>>,
  context: C,
  logger: MigrationLogger
): Promise<StepResult> {
  for (const step of steps) {
    logger.info(`[${stage}] ${step.name}...`);

    let result: StepResult<unknown>;
    try {
      result = await step.run(context);
    } catch (error) {
      const message = `${step.name} failed: ${errorMessage(error)}`;
      logger.error(message);
      return fail(message);
    }

    if (result.ok) {
      logger.success(result.message);
    } else if (step.policy === 'best-effort') {
      logger.warn(result.message);
    } else {
      logger.error(result.message);
      return fail(result.message);
    }
  }

  return ok(`${stage} completed`);
}

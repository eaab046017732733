/**
 * Sequential step runner with all-or-nothing semantics.
 *
 * Each step returns its own inverse, captured at the moment it applied
 * (the old MTU, the previous master, ...). When a step or the post-apply
 * check fails, the applied inverses run in reverse order. A failing inverse
 * is recorded and the unwind carries on; the reported error stays the one
 * that triggered the rollback. A step, inverse or check that throws is
 * treated as one that failed.
 */

import { Result } from "better-result";
import {
  DriverError,
  type NotFoundError,
  RollbackError,
  type TimeoutError,
  VerificationError,
} from "@hostnet/errors";
import { type Logger, silentLogger } from "@hostnet/logger";

export type StepError = DriverError | TimeoutError | NotFoundError;

export type TransactionError = StepError | VerificationError;

export type Undo = () => Promise<Result<void, StepError>>;

export interface TopologyStep {
  description: string;
  /** Perform the mutation. Returns its inverse, or null when there is nothing to undo. */
  apply(): Promise<Result<Undo | null, StepError>>;
}

export interface TransactionFailure {
  error: TransactionError;
  /** Inverses that failed while unwinding */
  rollbackErrors: RollbackError[];
  /** Description of the step that failed, or "verify" */
  failedStep: string;
}

export interface TransactionOptions {
  /** Post-apply check; failing it rolls back like a failed step */
  verify?: () => Promise<Result<void, TransactionError>>;
  logger?: Logger;
}

interface AppliedStep {
  description: string;
  undo: Undo;
}

export async function runTransaction(
  steps: TopologyStep[],
  options: TransactionOptions = {}
): Promise<Result<number, TransactionFailure>> {
  const logger = options.logger ?? silentLogger;
  const applied: AppliedStep[] = [];

  for (const step of steps) {
    logger.debug("Applying step", { step: step.description });
    const result = await applyStep(step);
    if (result.isErr()) {
      logger.error("Step failed, rolling back", {
        step: step.description,
        error: result.error.message,
        applied: applied.length,
      });
      const rollbackErrors = await rollback(applied, logger);
      return Result.err({ error: result.error, rollbackErrors, failedStep: step.description });
    }
    const undo = result.unwrap();
    if (undo) {
      applied.push({ description: step.description, undo });
    }
  }

  if (options.verify) {
    const verified = await runVerify(options.verify);
    if (verified.isErr()) {
      logger.error("Verification failed, rolling back", {
        error: verified.error.message,
        applied: applied.length,
      });
      const rollbackErrors = await rollback(applied, logger);
      return Result.err({ error: verified.error, rollbackErrors, failedStep: "verify" });
    }
  }

  return Result.ok(steps.length);
}

async function rollback(applied: AppliedStep[], logger: Logger): Promise<RollbackError[]> {
  const errors: RollbackError[] = [];
  for (const step of [...applied].reverse()) {
    const undone = await undoStep(step);
    if (undone.isErr()) {
      logger.warn("Rollback step failed", {
        step: step.description,
        error: undone.error.message,
      });
      errors.push(
        new RollbackError({
          message: `Failed to undo '${step.description}': ${undone.error.message}`,
          step: step.description,
          cause: undone.error,
        })
      );
    }
  }
  return errors;
}

function describeThrown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function applyStep(step: TopologyStep): Promise<Result<Undo | null, StepError>> {
  const attempted = await Result.tryPromise({
    try: () => step.apply(),
    catch: (error) =>
      new DriverError({
        message: `Step '${step.description}' threw: ${describeThrown(error)}`,
        operation: step.description,
        cause: error,
      }),
  });
  if (attempted.isErr()) {
    return Result.err(attempted.error);
  }
  return attempted.unwrap();
}

async function runVerify(
  verify: () => Promise<Result<void, TransactionError>>
): Promise<Result<void, TransactionError>> {
  const attempted = await Result.tryPromise({
    try: () => verify(),
    catch: (error) =>
      new VerificationError({
        message: `Verification threw: ${describeThrown(error)}`,
        drifts: [],
      }),
  });
  if (attempted.isErr()) {
    return Result.err(attempted.error);
  }
  return attempted.unwrap();
}

async function undoStep(step: AppliedStep): Promise<Result<void, StepError>> {
  const attempted = await Result.tryPromise({
    try: () => step.undo(),
    catch: (error) =>
      new DriverError({
        message: describeThrown(error),
        operation: step.description,
        cause: error,
      }),
  });
  if (attempted.isErr()) {
    return Result.err(attempted.error);
  }
  return attempted.unwrap();
}

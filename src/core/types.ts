import type { ItemProcessingError } from "./errors.js";

export interface WorkItem<P = string> {
  /** Unique within a batch */
  readonly id: string;
  readonly payload: P;
}

export type Outcome<R> =
  | { status: "success"; id: string; value: R }
  | { status: "failure"; id: string; error: ItemProcessingError }
  | { status: "cancelled"; id: string };

export type OutcomeStatus = Outcome<unknown>["status"];

export type Processor<P, R> = (item: WorkItem<P>) => R | Promise<R>;

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
}

export function createWorkItem<P>(id: string, payload: P): WorkItem<P> {
  return Object.freeze({ id, payload });
}

export function success<R>(id: string, value: R): Outcome<R> {
  return { status: "success", id, value };
}

export function failure<R>(id: string, error: ItemProcessingError): Outcome<R> {
  return { status: "failure", id, error };
}

export function cancelled<R>(id: string): Outcome<R> {
  return { status: "cancelled", id };
}

export function isSuccess<R>(outcome: Outcome<R>): outcome is Extract<Outcome<R>, { status: "success" }> {
  return outcome.status === "success";
}

export function isFailure<R>(outcome: Outcome<R>): outcome is Extract<Outcome<R>, { status: "failure" }> {
  return outcome.status === "failure";
}

export function isCancelled<R>(outcome: Outcome<R>): outcome is Extract<Outcome<R>, { status: "cancelled" }> {
  return outcome.status === "cancelled";
}

export function summarizeOutcomes(outcomes: readonly Outcome<unknown>[]): BatchSummary {
  const summary: BatchSummary = { total: outcomes.length, succeeded: 0, failed: 0, cancelled: 0 };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "success": summary.succeeded++; break;
      case "failure": summary.failed++; break;
      case "cancelled": summary.cancelled++; break;
    }
  }
  return summary;
}

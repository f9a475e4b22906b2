import type { ActionKind } from "./reconcile/plan.js";
import type { ReconciliationResult } from "./reconcile/reconciler.js";
import { CcBackupError, ProviderApiError, ProviderStateError, describeError } from "./util/errors.js";

export interface FailureReport {
  failed: true;
  msg: string;
  error: string;
  target?: string;
}

export function successReport(result: ReconciliationResult): string {
  return JSON.stringify(result, null, 2);
}

export function failureReport(error: unknown): string {
  const report: FailureReport = {
    failed: true,
    msg: describeError(error),
    error: error instanceof CcBackupError ? error.code : "unexpected",
  };
  if (error instanceof ProviderApiError || error instanceof ProviderStateError) report.target = error.target;
  return JSON.stringify(report, null, 2);
}

const ACTION_LABELS: Record<ActionKind, { done: string; planned: string }> = {
  noop: { done: "unchanged", planned: "unchanged" },
  add: { done: "client added", planned: "client would be added" },
  remove: { done: "client removed", planned: "client would be removed" },
  modify: { done: "service plan re-applied", planned: "service plan would be re-applied" },
};

export function summarize(result: ReconciliationResult, check = false): string[] {
  return result.actions.map(({ target, action }) => {
    const label = ACTION_LABELS[action];
    return `${target}: ${check ? label.planned : label.done}`;
  });
}

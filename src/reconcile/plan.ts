import type { DesiredState } from "../config/schema.js";
import type { BackupClient, BackupDetails } from "../provider/types.js";
import { UnhandledStateError } from "../util/errors.js";

export type ReconcileAction =
  | { kind: "noop" }
  | { kind: "add" }
  | { kind: "remove"; client: BackupClient }
  | { kind: "modify"; client: BackupClient; servicePlan: string };

export type ActionKind = ReconcileAction["kind"];

/** First client of the given type; the provider allows at most one per type. */
export function findBackupClient(details: BackupDetails, clientType: string): BackupClient | undefined {
  return details.clients.find((client) => client.type === clientType);
}

export function planAction(
  desiredState: DesiredState,
  existing: BackupClient | undefined,
  details: BackupDetails,
): ReconcileAction {
  switch (desiredState) {
    case "absent":
      return existing ? { kind: "remove", client: existing } : { kind: "noop" };
    case "present":
      return existing
        ? { kind: "modify", client: existing, servicePlan: details.servicePlan }
        : { kind: "add" };
    default:
      throw new UnhandledStateError(String(desiredState));
  }
}

export function isChange(action: ReconcileAction): boolean {
  return action.kind !== "noop";
}

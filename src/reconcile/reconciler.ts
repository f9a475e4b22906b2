import type { ClientType, DesiredState, ModuleParams, NotifyTrigger, SchedulePolicy } from "../config/schema.js";
import type { BackupClient, BackupDetails, BackupService } from "../provider/types.js";
import {
  ConfigurationError,
  ProviderApiError,
  ProviderStateError,
  getErrorMessage,
  isNotProvisionedError,
  type ProviderOperation,
} from "../util/errors.js";
import { log } from "../util/logger.js";
import { findBackupClient, isChange, planAction, type ActionKind, type ReconcileAction } from "./plan.js";

export interface BackupClientSpec {
  clientType: ClientType;
  storagePolicy?: string;
  schedulePolicy?: SchedulePolicy;
  notifyEmail: string;
  notifyTrigger: NotifyTrigger;
}

export interface ReconcileRequest {
  state: DesiredState;
  spec: BackupClientSpec;
  targets: string[];
}

export interface ReconcileOptions {
  /** Read and plan only; no write reaches the provider */
  check?: boolean;
}

export interface BackupRecord {
  id: string;
  client_type: string;
  storage_policy: string;
  schedule_policy: string;
  download_url: string | null;
}

export interface TargetOutcome {
  target: string;
  action: ActionKind;
}

export interface ReconciliationResult {
  changed: boolean;
  msg: string;
  backups: Record<string, BackupRecord>;
  actions: TargetOutcome[];
}

export function toReconcileRequest(params: ModuleParams): ReconcileRequest {
  return {
    state: params.state,
    targets: params.node_ids,
    spec: {
      clientType: params.client_type,
      storagePolicy: params.storage_policy,
      schedulePolicy: params.schedule_policy,
      notifyEmail: params.notify_email,
      notifyTrigger: params.notify_trigger,
    },
  };
}

export function toBackupRecord(client: BackupClient): BackupRecord {
  return {
    id: client.id,
    client_type: client.type,
    storage_policy: client.storagePolicy,
    schedule_policy: client.schedulePolicy,
    download_url: client.downloadUrl ?? null,
  };
}

interface AddSpec {
  clientType: ClientType;
  storagePolicy: string;
  schedulePolicy: SchedulePolicy;
  notifyEmail: string;
  notifyTrigger: NotifyTrigger;
}

function requireKey<T>(value: T | undefined, key: string): T {
  if (value === undefined || value === null || value === "") {
    throw new ConfigurationError(`Need key ${key} for adding a client`);
  }
  return value;
}

/** Checks everything an add would need, before any target is contacted. */
export function validateRequest(request: ReconcileRequest): AddSpec | undefined {
  if (request.targets.length === 0) throw new ConfigurationError("At least one node id is required");
  if (request.state !== "present") return undefined;
  const { spec } = request;
  return {
    storagePolicy: requireKey(spec.storagePolicy, "storage_policy"),
    schedulePolicy: requireKey(spec.schedulePolicy, "schedule_policy"),
    clientType: requireKey(spec.clientType, "client_type"),
    notifyEmail: spec.notifyEmail,
    notifyTrigger: spec.notifyTrigger,
  };
}

/**
 * Drives each target, one at a time and in input order, to the desired
 * presence of a backup client. The first failure aborts the run; writes
 * already made to earlier targets stay in place.
 *
 * A client that is already present is re-applied with the target's current
 * service plan and always counts as a change. Its reported state is the one
 * read before that call.
 */
export class Reconciler {
  constructor(private readonly service: BackupService) {}

  async reconcile(request: ReconcileRequest, options: ReconcileOptions = {}): Promise<ReconciliationResult> {
    const addSpec = validateRequest(request);
    const check = options.check ?? false;
    const backups: Record<string, BackupRecord> = {};
    const actions: TargetOutcome[] = [];
    let changed = false;

    for (const target of request.targets) {
      const details = await this.readDetails(target);
      const existing = findBackupClient(details, request.spec.clientType);
      const action = planAction(request.state, existing, details);
      log.debug(`${target}: ${action.kind}${check ? " (check mode)" : ""}`);

      if (isChange(action)) changed = true;
      actions.push({ target, action: action.kind });
      if (check) {
        if (action.kind === "modify") backups[target] = toBackupRecord(action.client);
        continue;
      }

      const record = await this.apply(target, action, request.spec.clientType, addSpec);
      if (record) backups[target] = record;
    }

    return { changed, msg: "Success", backups, actions };
  }

  private async apply(
    target: string,
    action: ReconcileAction,
    clientType: ClientType,
    addSpec: AddSpec | undefined,
  ): Promise<BackupRecord | undefined> {
    switch (action.kind) {
      case "noop":
        return undefined;
      case "remove": {
        const { client } = action;
        log.info(`Removing ${client.type} backup client ${client.id} from ${target}`);
        const accepted = await this.write(target, "remove", `Failed removing client from host ${target}`, () =>
          this.service.removeClient(target, client));
        if (!accepted) throw new ProviderApiError(target, "remove", `Failed removing client from host ${target}: request was not accepted`);
        return undefined;
      }
      case "add": {
        const spec = requireKey(addSpec, "storage_policy");
        log.info(`Adding ${clientType} backup client to ${target}`);
        await this.write(target, "add", `Failed adding client to host ${target}`, () =>
          this.service.addClient(target, spec));
        const details = await this.readDetails(target);
        const created = findBackupClient(details, clientType);
        if (!created) {
          throw new ProviderApiError(target, "add", `Failed adding client to host ${target}: no ${clientType} client found after adding it`);
        }
        return toBackupRecord(created);
      }
      case "modify": {
        const { client, servicePlan } = action;
        log.info(`Re-applying service plan ${servicePlan} to ${target}`);
        const accepted = await this.write(target, "modify", `Failed modifying backup for host ${target}`, () =>
          this.service.updateTarget(target, { servicePlan }));
        if (!accepted) throw new ProviderApiError(target, "modify", `Failed modifying backup for host ${target}: request was not accepted`);
        return toBackupRecord(client);
      }
    }
  }

  private async readDetails(target: string): Promise<BackupDetails> {
    try {
      return await this.service.getBackupDetails(target);
    } catch (err) {
      if (isNotProvisionedError(err)) {
        throw new ProviderStateError(target, `Server ${target} does not have backup enabled`, { cause: err });
      }
      throw new ProviderApiError(target, "read", `Problem finding backup info for host ${target}: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  private async write<T>(target: string, operation: ProviderOperation, prefix: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new ProviderApiError(target, operation, `${prefix}: ${getErrorMessage(err)}`, { cause: err });
    }
  }
}

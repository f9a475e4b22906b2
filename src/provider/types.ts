import type { ClientType, NotifyTrigger, SchedulePolicy } from "../config/schema.js";

// ── Observed state ──
export interface BackupClient {
  id: string;
  /** Agent kind as the provider names it, e.g. "MySQL" or "FA.Linux" */
  type: string;
  status?: string;
  storagePolicy: string;
  schedulePolicy: string;
  downloadUrl?: string;
  alerting?: { trigger: string; emails: string[] };
}

export interface BackupDetails {
  targetId: string;
  servicePlan: string;
  state?: string;
  clients: BackupClient[];
}

// ── Writes ──
export interface NewBackupClientRequest {
  clientType: ClientType;
  storagePolicy: string;
  schedulePolicy: SchedulePolicy;
  notifyTrigger: NotifyTrigger;
  notifyEmail: string;
}

export interface BackupClientRef {
  id: string;
  downloadUrl?: string;
}

export interface TargetUpdate {
  servicePlan: string;
}

/**
 * Narrow capability surface the reconciler drives. Implementations throw on
 * any provider failure; the reconciler decides how to classify it.
 */
export interface BackupService {
  getBackupDetails(targetId: string): Promise<BackupDetails>;
  addClient(targetId: string, request: NewBackupClientRequest): Promise<BackupClientRef>;
  removeClient(targetId: string, client: BackupClient): Promise<boolean>;
  updateTarget(targetId: string, update: TargetUpdate): Promise<boolean>;
}

export interface ProviderConfig {
  userId: string;
  password: string;
  region: string;
  /** Overrides the host derived from the region */
  apiHost?: string;
  verifySslCert: boolean;
}

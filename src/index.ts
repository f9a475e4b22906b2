// ccbackup: backup client reconciliation for CloudControl servers
// Public API exports

// Config
export {
  type CcBackupConfig, CcBackupConfigSchema, DEFAULT_CONFIG, type ModuleParams, ModuleParamsSchema,
  CLIENT_TYPES, STORAGE_POLICIES, SCHEDULE_POLICIES, NOTIFY_TRIGGERS, DESIRED_STATES,
  type ClientType, type SchedulePolicy, type NotifyTrigger, type DesiredState,
} from "./config/schema.js";
export { loadConfig, resolveCredentials, type Credentials } from "./config/loader.js";
export { resolveConfigDir, resolveConfigFilePath } from "./config/paths.js";
export { parseModuleParams, parseKeyValueArgs, loadParamsFile, normalizeParams, type RawParams } from "./config/params.js";

// Provider
export { type BackupService, type BackupDetails, type BackupClient, type BackupClientRef, type NewBackupClientRequest, type TargetUpdate, type ProviderConfig } from "./provider/types.js";
export { CloudControlBackupService, CloudControlApiError, createFetch, type FetchLike, type HttpRequestInit, type HttpResponse } from "./provider/cloudcontrol.js";
export { listRegions, resolveRegionHost } from "./provider/regions.js";

// Reconcile
export { planAction, findBackupClient, isChange, type ReconcileAction, type ActionKind } from "./reconcile/plan.js";
export {
  Reconciler, validateRequest, toReconcileRequest, toBackupRecord,
  type ReconcileRequest, type ReconcileOptions, type ReconciliationResult, type BackupRecord, type BackupClientSpec, type TargetOutcome,
} from "./reconcile/reconciler.js";
export { applyBackupClients, type ApplyInput, type ServiceFactory } from "./apply.js";
export { successReport, failureReport, summarize, type FailureReport } from "./report.js";

// Util
export { log, setVerbose, setQuiet, setJsonMode, setLogFile, type LogLevel } from "./util/logger.js";
export {
  CcBackupError, ConfigurationError, ProviderStateError, ProviderApiError, UnhandledStateError,
  describeError, getErrorMessage, isAuthError, isTimeoutError, isNotProvisionedError,
  type ErrorCode, type ProviderOperation,
} from "./util/errors.js";

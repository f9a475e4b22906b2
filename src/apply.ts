import { loadConfig, resolveCredentials } from "./config/loader.js";
import type { CcBackupConfig } from "./config/schema.js";
import { parseModuleParams, type RawParams } from "./config/params.js";
import { CloudControlBackupService } from "./provider/cloudcontrol.js";
import type { BackupService, ProviderConfig } from "./provider/types.js";
import {
  Reconciler,
  toReconcileRequest,
  validateRequest,
  type ReconciliationResult,
} from "./reconcile/reconciler.js";
import { log } from "./util/logger.js";

export type ServiceFactory = (config: ProviderConfig) => BackupService;

export interface ApplyInput {
  /** Raw parameter sources, lowest precedence first */
  sources: RawParams[];
  configPath?: string;
  /** Already loaded config; `configPath` is ignored when given */
  config?: CcBackupConfig;
  check?: boolean;
}

const defaultFactory: ServiceFactory = (config) => new CloudControlBackupService(config);

export async function applyBackupClients(
  input: ApplyInput,
  createService: ServiceFactory = defaultFactory,
): Promise<ReconciliationResult> {
  const config = input.config ?? loadConfig(input.configPath);
  const params = parseModuleParams(
    { region: config.region, verify_ssl_cert: config.verifySslCert },
    ...input.sources,
  );
  const request = toReconcileRequest(params);
  validateRequest(request);

  const credentials = resolveCredentials(config);
  const service = createService({
    ...credentials,
    region: params.region,
    apiHost: config.apiHost,
    verifySslCert: params.verify_ssl_cert,
  });
  log.debug(`Reconciling ${request.targets.length} target(s) to state ${request.state} in region ${params.region}`);
  return new Reconciler(service).reconcile(request, { check: input.check });
}

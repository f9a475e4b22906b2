import { Command } from "commander";
import chalk from "chalk";
import { applyBackupClients } from "./apply.js";
import { loadConfig } from "./config/loader.js";
import { loadParamsFile, parseKeyValueArgs, type RawParams } from "./config/params.js";
import { SCHEDULE_POLICIES, STORAGE_POLICIES, CLIENT_TYPES } from "./config/schema.js";
import { listRegions } from "./provider/regions.js";
import { failureReport, successReport, summarize } from "./report.js";
import { setVerbose, setQuiet, setJsonMode, setLogFile, log } from "./util/logger.js";

const VERSION = "0.1.0";

interface ApplyOptions {
  state?: string;
  nodeId: string[];
  serverId: string[];
  clientType?: string;
  storagePolicy?: string;
  schedulePolicy?: string;
  notifyEmail?: string;
  notifyTrigger?: string;
  region?: string;
  verifySslCert?: boolean;
  params?: string;
  check?: boolean;
  config?: string;
  logFile?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

// Repeatable single-value flag, so trailing key=value words stay positional
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function flagParams(opts: ApplyOptions): RawParams {
  const ids = [...opts.nodeId, ...opts.serverId];
  return {
    state: opts.state,
    node_ids: ids.length > 0 ? ids : undefined,
    client_type: opts.clientType,
    storage_policy: opts.storagePolicy,
    schedule_policy: opts.schedulePolicy,
    notify_email: opts.notifyEmail,
    notify_trigger: opts.notifyTrigger,
    region: opts.region,
    verify_ssl_cert: opts.verifySslCert,
  };
}

export function createProgram(): Command {
  const program = new Command()
    .name("ccbackup")
    .description("Add or remove backup clients on CloudControl servers")
    .version(VERSION);

  // ── Apply (default) ──
  program
    .option("--state <state>", "Desired state: present or absent")
    .option("--node-id <id>", "Server id to work on (repeatable)", collect, [])
    .option("--server-id <id>", "Alias of --node-id (repeatable)", collect, [])
    .option("--client-type <type>", `Backup client type: ${CLIENT_TYPES.join(", ")}`)
    .option("--storage-policy <policy>", "Storage policy, e.g. \"30 Day Storage Policy\"")
    .option("--schedule-policy <window>", "Schedule window, e.g. \"12AM - 6AM\"")
    .option("--notify-email <email>", "Email to notify on the trigger")
    .option("--notify-trigger <trigger>", "ON_FAILURE or ON_SUCCESS")
    .option("--region <code>", "Region code (see `ccbackup regions`)")
    .option("--verify-ssl-cert", "Validate the API's TLS certificate")
    .option("--no-verify-ssl-cert", "Skip TLS certificate validation")
    .option("-p, --params <file>", "JSON5 file of parameters")
    .option("--check", "Report what would change without changing anything")
    .option("--config <path>", "Config file path override")
    .option("--log-file <path>", "Also append log lines to this file")
    .option("--verbose", "Verbose output")
    .option("-q, --quiet", "Only log warnings and errors")
    .option("--json", "JSON log lines on stderr, no human summary")
    .argument("[params...]", "Parameters as key=value (e.g. node_ids=a,b state=absent)")
    .action(async (pairs: string[], opts: ApplyOptions) => {
      if (opts.quiet) setQuiet(true);
      if (opts.verbose) setVerbose(true);
      if (opts.json) setJsonMode(true);

      try {
        const config = loadConfig(opts.config);
        const logFile = opts.logFile ?? config.logFile;
        if (logFile) setLogFile(logFile);

        const sources: RawParams[] = [];
        if (opts.params) sources.push(loadParamsFile(opts.params));
        sources.push(parseKeyValueArgs(pairs), flagParams(opts));

        const result = await applyBackupClients({ sources, config, check: opts.check });
        if (!opts.json) {
          for (const line of summarize(result, opts.check)) log.info(line);
        }
        console.log(successReport(result));
      } catch (error) {
        log.error(error instanceof Error ? error.message : String(error));
        console.log(failureReport(error));
        process.exitCode = 1;
      }
    });

  // ── Regions subcommand ──
  program
    .command("regions")
    .description("List known region codes")
    .option("--config <path>", "Config file path override")
    .action((opts: { config?: string }) => {
      const current = loadConfig(opts.config).region;
      for (const region of listRegions()) {
        console.log(region === current ? `${chalk.green(region)} ${chalk.dim("(default)")}` : region);
      }
    });

  // ── Policies subcommand ──
  program
    .command("policies")
    .description("List storage and schedule policy choices")
    .action(() => {
      console.log(chalk.cyan("Storage policies:"));
      for (const policy of STORAGE_POLICIES) console.log(`  ${policy}`);
      console.log();
      console.log(chalk.cyan("Schedule policies:"));
      for (const policy of SCHEDULE_POLICIES) console.log(`  ${policy}`);
    });

  return program;
}

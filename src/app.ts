import { BatchRunner, type DomainCheck } from "./analysis/runner";
import type { BatchSummary, ProgressEvent } from "./analysis/types";
import { ConfigError, loadConfig, resolveConfigPath, type CheckerConfig } from "./config";
import { notifyHealthcheck, type HealthcheckPing } from "./healthcheck";
import { renderReport } from "./report";
import { saveReport } from "./storage/report-store";
import type { Logger } from "./types";

export const USAGE = `Usage: security-txt-checker [config.yaml] [--json <report.json>]

Checks the security.txt of every domain listed in the config file.
The config path defaults to $SECURITY_TXT_CONFIG, then config.yaml.`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  configPath?: string;
  jsonPath?: string;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false };
  const rest = [...argv];

  while (rest.length) {
    const arg = rest.shift();
    if (arg === undefined) break;

    if (arg === "-h" || arg === "--help") {
      args.help = true;
    } else if (arg === "--json") {
      const value = rest.shift();
      if (!value || value.startsWith("-")) {
        throw new UsageError("--json requires a file path");
      }
      args.jsonPath = value;
    } else if (arg.startsWith("--json=")) {
      args.jsonPath = arg.slice("--json=".length);
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option ${arg}`);
    } else if (args.configPath === undefined) {
      args.configPath = arg;
    } else {
      throw new UsageError(`unexpected argument ${arg}`);
    }
  }

  return args;
}

export interface RunOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  log?: Logger;
  check?: DomainCheck;
  ping?: HealthcheckPing;
  load?: (configPath: string) => Promise<CheckerConfig>;
}

const describeProgress = (event: ProgressEvent) => {
  const prefix = `[${event.position}/${event.total}]`;
  if (event.type === "start") {
    return `${prefix} checking ${event.domain}`;
  }
  const { result } = event;
  return result.isValid
    ? `${prefix} ${event.domain}: ✓ valid`
    : `${prefix} ${event.domain}: ✗ invalid (${result.errors.length} error(s))`;
};

/**
 * Loads the configuration, checks every domain, prints the report and pings
 * the healthcheck. Resolves to the process exit code.
 */
export async function runChecker({
  argv = process.argv.slice(2),
  env = process.env,
  log = console,
  check,
  ping,
  load = loadConfig,
}: RunOptions = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(`Error: ${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    log.log(USAGE);
    return 0;
  }

  const configPath = resolveConfigPath(args.configPath, env);
  let config: CheckerConfig;
  try {
    config = await load(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(`Error: invalid configuration (${error.configPath ?? configPath}): ${error.message}`);
      return 1;
    }
    throw error;
  }

  log.log(`Loaded ${config.domains.length} domain(s) from ${configPath}`);
  log.log(`Minimum expiry: ${config.minExpiryDays} day(s) in the future\n`);

  const runner = new BatchRunner({ check, onProgress: (event) => log.log(describeProgress(event)) });
  let summary: BatchSummary | null = null;
  let exitCode = 1;

  try {
    summary = await runner.run(config);
    log.log(`\n${renderReport(summary)}`);
    exitCode = summary.failed > 0 ? 1 : 0;

    if (args.jsonPath) {
      try {
        const record = await saveReport(args.jsonPath, summary);
        log.log(`JSON report ${record.id} written to ${args.jsonPath}`);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        log.error(`Error: unable to write JSON report: ${reason}`);
        exitCode = 1;
      }
    }
  } finally {
    await notifyHealthcheck(summary, config, { env, ping, log });
  }

  return exitCode;
}

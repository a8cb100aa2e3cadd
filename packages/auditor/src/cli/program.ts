/**
 * Command-line entry for the snapshot backup audit
 *
 * Usage:
 *   snapshot-audit [options]
 *
 * Options:
 *   -o, --output <path>            Report path (default: ./backup_report_YYYYMMDD_HHMMSSZ.json)
 *   -l, --lookback-hours <hours>   Lookback window in hours
 *   -r, --regions [regions...]     Regions to audit (space or comma separated)
 *   -p, --provider <provider>      alibaba | aws
 */
import { Command } from 'commander';
import {
  type AuditConfig,
  type RawAuditConfig,
  type Logger,
  hasPlaceholderCredentials,
  loadConfigFromEnv,
  logger,
  mergeConfig,
  parseList,
  defaultReportPath,
  AuditConfigSchema,
} from '@snapshot-audit/shared';
import { createReportBuilder } from '../audit/create-report-builder';
import type { SnapshotClientSource } from '../clients/region-client-pool';
import { saveJsonReport } from '../report/report-writer';

/**
 * Options as commander hands them over
 */
export interface AuditCliOptions {
  output?: string;
  lookbackHours?: string;
  /** `true` when -r is given without values */
  regions?: string[] | boolean;
  provider?: string;
  pageSize?: string;
  concurrency?: string;
  timeout?: string;
  logLevel?: string;
}

export interface AuditCliDeps {
  env?: NodeJS.ProcessEnv;
  /** Replaces the provider clients built from configuration */
  createClients?: (config: AuditConfig) => SnapshotClientSource;
  clock?: () => Date;
  print?: (line: string) => void;
  logger?: Logger;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Map CLI flags onto configuration keys
 */
export function cliOverrides(options: AuditCliOptions): RawAuditConfig {
  let regions: string[] | undefined;
  if (Array.isArray(options.regions)) {
    regions = options.regions.flatMap(parseList);
  } else if (options.regions === true) {
    regions = [];
  }

  return {
    provider: options.provider?.toUpperCase(),
    regions,
    lookbackHours: toNumber(options.lookbackHours),
    pageSize: toNumber(options.pageSize),
    regionConcurrency: toNumber(options.concurrency),
    requestTimeoutMs: toNumber(options.timeout),
    logLevel: options.logLevel?.toUpperCase(),
  };
}

/**
 * Run one audit and write its report. Resolves to the process exit code.
 */
export async function runAudit(options: AuditCliOptions, deps: AuditCliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const clock = deps.clock ?? (() => new Date());
  const startedAt = clock();

  const parsed = AuditConfigSchema.safeParse(
    mergeConfig(loadConfigFromEnv(deps.env ?? process.env), cliOverrides(options))
  );
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    print(`[ERROR] Invalid configuration: ${issues}`);
    return 1;
  }
  const config = parsed.data;

  const log = deps.logger ?? logger;
  log.setLevel(config.logLevel);

  if (hasPlaceholderCredentials(config.credentials)) {
    print('[WARN] MASTER_ACCESS_KEY_ID/SECRET look like placeholders. Set environment variables.');
  }
  if (config.regions.length === 0) {
    print('[ERROR] No regions specified. Use --regions to provide at least one region.');
    return 1;
  }

  const builder = createReportBuilder(config, {
    clients: deps.createClients?.(config),
    clock,
    logger: log,
  });
  const report = await builder.buildReport(config.regions, config.lookbackHours);
  const outputPath = await saveJsonReport(report, options.output ?? defaultReportPath(startedAt));

  print(`[OK] Report saved: ${outputPath}`);
  return 0;
}

export function createProgram(deps: AuditCliDeps = {}): Command {
  const program = new Command();

  program
    .name('snapshot-audit')
    .description('Audit recent block-storage snapshots across regions and save a JSON report')
    .option('-o, --output <path>', 'Output JSON file path (default: ./backup_report_YYYYMMDD_HHMMSSZ.json)')
    .option('-l, --lookback-hours <hours>', 'Lookback window in hours (default: LOOKBACK_HOURS or 24)')
    .option('-r, --regions [regions...]', 'Regions to check (default: AUDIT_REGIONS or cn-hangzhou cn-shanghai)')
    .option('-p, --provider <provider>', 'Cloud provider: alibaba|aws (default: CLOUD_PROVIDER or alibaba)')
    .option('--page-size <n>', 'Snapshots requested per page (default: 50)')
    .option('--concurrency <n>', 'Regions audited at once (default: 1)')
    .option('--timeout <ms>', 'Per-request transport timeout in milliseconds')
    .option('--log-level <level>', 'debug|info|warn|error (default: info)')
    .action(async (options: AuditCliOptions) => {
      process.exitCode = await runAudit(options, deps);
    });

  return program;
}

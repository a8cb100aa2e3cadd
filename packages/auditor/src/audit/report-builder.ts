/**
 * Report Builder
 *
 * Audits each region and rolls the results up into one report. Regions keep
 * the order they were given in, whatever order their audits finish in.
 */
import pLimit from 'p-limit';
import {
  type BackupReport,
  type Logger,
  formatUtcSeconds,
  logger,
  maskAccessKey,
} from '@snapshot-audit/shared';
import { RegionAuditor } from './region-auditor';

export interface ReportBuilderOptions {
  auditor: RegionAuditor;
  /** Masked before it is written into the report */
  accessKeyId: string;
  /** Regions audited at once; 1 keeps the audit strictly sequential */
  regionConcurrency?: number;
  clock?: () => Date;
  logger?: Logger;
}

export class ReportBuilder {
  private auditor: RegionAuditor;
  private accessKeyId: string;
  private regionConcurrency: number;
  private clock: () => Date;
  private log: Logger;

  constructor(options: ReportBuilderOptions) {
    this.auditor = options.auditor;
    this.accessKeyId = options.accessKeyId;
    this.regionConcurrency = options.regionConcurrency ?? 1;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? logger;
  }

  async buildReport(regions: string[], lookbackHours: number): Promise<BackupReport> {
    const generatedAt = formatUtcSeconds(this.clock());
    const limit = pLimit(this.regionConcurrency);

    this.log.info('Building backup report', {
      regionCount: regions.length,
      lookbackHours,
      regionConcurrency: this.regionConcurrency,
    });

    const entries = await Promise.all(
      regions.map((region) => limit(() => this.auditor.auditRegion(region, lookbackHours)))
    );

    const totalRecent = entries.reduce(
      (sum, entry) => sum + entry.backup_verification.recent_snapshot_count,
      0
    );
    const regionsWithRecent = entries.filter(
      (entry) => entry.backup_verification.result === 'success'
    ).length;

    this.log.info('Backup report built', {
      regionsWithRecentBackups: regionsWithRecent,
      totalRecentSnapshots: totalRecent,
    });

    return {
      generated_at_utc: generatedAt,
      lookback_hours: lookbackHours,
      account_access_key_id: maskAccessKey(this.accessKeyId),
      regions_count: regions.length,
      regions_with_recent_backups: regionsWithRecent,
      total_recent_snapshots: totalRecent,
      entries,
    };
  }
}

/**
 * Region Auditor
 *
 * Pages through every snapshot in a region, flags the ones created inside the
 * lookback window and attaches instance details. A failure anywhere in the
 * region is reported inside the returned entry rather than thrown.
 */
import {
  type Logger,
  type RegionEntry,
  type SnapshotPayload,
  type SnapshotRecord,
  type SnapshotStatusFilter,
  DEFAULT_PAGE_SIZE,
  errorMessage,
  formatUtcSeconds,
  logger,
  parseOptionalInt,
  parseUtcSeconds,
  subtractHours,
} from '@snapshot-audit/shared';
import type { SnapshotClientSource } from '../clients/region-client-pool';
import { AttachmentResolver } from '../resolvers/attachment-resolver';
import { InstanceNameResolver } from '../resolvers/instance-name-resolver';

export const QUERY_ERROR_NOTE = 'Query error encountered.';

export interface RegionAuditorOptions {
  clients: SnapshotClientSource;
  attachments: AttachmentResolver;
  names: InstanceNameResolver;
  pageSize?: number;
  status?: SnapshotStatusFilter;
  clock?: () => Date;
  logger?: Logger;
}

export class RegionAuditor {
  private clients: SnapshotClientSource;
  private attachments: AttachmentResolver;
  private names: InstanceNameResolver;
  private pageSize: number;
  private status: SnapshotStatusFilter;
  private clock: () => Date;
  private log: Logger;

  constructor(options: RegionAuditorOptions) {
    this.clients = options.clients;
    this.attachments = options.attachments;
    this.names = options.names;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.status = options.status ?? 'all';
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? logger;
  }

  async auditRegion(region: string, lookbackHours: number): Promise<RegionEntry> {
    const log = this.log.child({ region });
    let cutoffUtc = '';

    try {
      const cutoff = subtractHours(this.clock(), lookbackHours);
      cutoffUtc = formatUtcSeconds(cutoff);
      log.info('Auditing region', { lookbackHours, cutoffUtc });

      const snapshots = await this.collectSnapshots(region, cutoff, log);
      const recentCount = snapshots.filter((snapshot) => snapshot.is_recent).length;

      log.info('Region audit complete', {
        snapshotCount: snapshots.length,
        recentSnapshotCount: recentCount,
      });

      return {
        region,
        snapshots,
        backup_verification: {
          result: recentCount > 0 ? 'success' : 'fail',
          recent_snapshot_count: recentCount,
          cutoff_utc: cutoffUtc,
          lookback_hours: lookbackHours,
        },
      };
    } catch (error) {
      log.error('Region audit failed', { error: errorMessage(error) });

      return {
        region,
        snapshots: [{ error: `${region}: ${errorMessage(error)}` }],
        backup_verification: {
          result: 'fail',
          recent_snapshot_count: 0,
          cutoff_utc: cutoffUtc,
          lookback_hours: lookbackHours,
          note: QUERY_ERROR_NOTE,
        },
      };
    }
  }

  /**
   * Offset pagination: stop once the reported total is covered or a page
   * comes back empty.
   */
  private async collectSnapshots(
    region: string,
    cutoff: Date,
    log: Logger
  ): Promise<SnapshotRecord[]> {
    const client = this.clients.get(region);
    const records: SnapshotRecord[] = [];
    let pageNumber = 1;
    let hasMore = true;

    while (hasMore) {
      const page = await client.listSnapshots({
        pageNumber,
        pageSize: this.pageSize,
        status: this.status,
      });
      log.debug('Fetched snapshot page', {
        pageNumber,
        itemCount: page.snapshots.length,
        totalCount: page.totalCount,
      });

      for (const payload of page.snapshots) {
        records.push(await this.buildRecord(region, payload, cutoff));
      }

      const maxPage = Math.ceil(page.totalCount / this.pageSize);
      hasMore = pageNumber < maxPage && page.snapshots.length > 0;
      pageNumber += 1;
    }

    return records;
  }

  private async buildRecord(
    region: string,
    payload: SnapshotPayload,
    cutoff: Date
  ): Promise<SnapshotRecord> {
    const createdAt = parseUtcSeconds(payload.creationTime);
    const sourceDiskId = payload.sourceDiskId ?? '';

    let instanceIds: string[] = [];
    const instanceNames: (string | null)[] = [];
    if (sourceDiskId) {
      instanceIds = await this.attachments.resolveAttachedInstances(region, sourceDiskId);
      for (const instanceId of instanceIds) {
        instanceNames.push(await this.names.resolveInstanceName(region, instanceId));
      }
    }

    return {
      snapshot_id: payload.snapshotId,
      status: payload.status ?? '',
      created_utc: payload.creationTime,
      source_disk_id: sourceDiskId,
      source_disk_type: payload.sourceDiskType ?? '',
      progress: payload.progress ?? '',
      product_code: payload.productCode ?? '',
      usage: payload.usage ?? '',
      source_disk_size_gb: parseOptionalInt(payload.sourceDiskSize),
      actual_snapshot_size_gb: parseOptionalInt(payload.actualSnapshotSize),
      is_recent: createdAt.getTime() > cutoff.getTime(),
      instance_id: instanceIds.length > 0 ? instanceIds[0] : null,
      instance_name: instanceNames.length > 0 ? instanceNames[0] : null,
      attached_instance_ids: instanceIds,
      attached_instance_names: instanceNames,
    };
  }
}

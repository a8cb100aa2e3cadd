/**
 * Resolves which instances a disk is attached to
 */
import { type DiskPayload, type Logger, errorMessage, logger, uniqueSorted } from '@snapshot-audit/shared';
import { LookupCache, type LookupOutcome } from '../cache/lookup-cache';
import type { SnapshotClientSource } from '../clients/region-client-pool';

/**
 * Instance ids from the structured attachment list, or from the disk's own
 * instance id when no list is reported. Deduplicated and sorted.
 */
export function extractInstanceIds(disk: DiskPayload): string[] {
  const ids: string[] = [];
  if (disk.attachments && disk.attachments.length > 0) {
    for (const attachment of disk.attachments) {
      if (attachment.instanceId) {
        ids.push(attachment.instanceId);
      }
    }
  } else if (disk.instanceId) {
    ids.push(disk.instanceId);
  }
  return uniqueSorted(ids);
}

export class AttachmentResolver {
  private clients: SnapshotClientSource;
  private cache: LookupCache<string[]>;
  private log: Logger;

  constructor(
    clients: SnapshotClientSource,
    cache: LookupCache<string[]> = new LookupCache<string[]>(),
    log: Logger = logger
  ) {
    this.clients = clients;
    this.cache = cache;
    this.log = log;
  }

  /**
   * Look up attachments for one disk, keeping failures distinct from "none"
   */
  lookup(region: string, diskId: string): Promise<LookupOutcome<string[]>> {
    if (!diskId) {
      return Promise.resolve({ status: 'not-found' });
    }

    return this.cache.getOrLoad(region, diskId, async () => {
      try {
        const disk = await this.clients.get(region).describeDisk(diskId);
        if (!disk) {
          return { status: 'not-found' };
        }
        return { status: 'found', value: extractInstanceIds(disk) };
      } catch (error) {
        this.log.warn('Disk attachment lookup failed', {
          region,
          diskId,
          error: errorMessage(error),
        });
        return { status: 'failed', error: errorMessage(error) };
      }
    });
  }

  /**
   * Attached instance ids, empty when the disk is unknown or the lookup failed
   */
  async resolveAttachedInstances(region: string, diskId: string): Promise<string[]> {
    const outcome = await this.lookup(region, diskId);
    return outcome.status === 'found' ? [...outcome.value] : [];
  }
}

/**
 * Resolves instance display names
 */
import { type Logger, errorMessage, logger } from '@snapshot-audit/shared';
import { LookupCache, type LookupOutcome } from '../cache/lookup-cache';
import type { SnapshotClientSource } from '../clients/region-client-pool';

export class InstanceNameResolver {
  private clients: SnapshotClientSource;
  private cache: LookupCache<string>;
  private log: Logger;

  constructor(
    clients: SnapshotClientSource,
    cache: LookupCache<string> = new LookupCache<string>(),
    log: Logger = logger
  ) {
    this.clients = clients;
    this.cache = cache;
    this.log = log;
  }

  lookup(region: string, instanceId: string): Promise<LookupOutcome<string>> {
    return this.cache.getOrLoad(region, instanceId, async () => {
      try {
        const instance = await this.clients.get(region).describeInstance(instanceId);
        if (!instance?.instanceName) {
          return { status: 'not-found' };
        }
        return { status: 'found', value: instance.instanceName };
      } catch (error) {
        this.log.warn('Instance name lookup failed', {
          region,
          instanceId,
          error: errorMessage(error),
        });
        return { status: 'failed', error: errorMessage(error) };
      }
    });
  }

  async resolveInstanceName(region: string, instanceId: string): Promise<string | null> {
    const outcome = await this.lookup(region, instanceId);
    return outcome.status === 'found' ? outcome.value : null;
  }
}

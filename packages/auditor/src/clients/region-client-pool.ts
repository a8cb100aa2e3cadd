/**
 * One snapshot client per region, created on first use
 */
import { AdapterFactory, type ISnapshotClient, type SnapshotClientOptions } from '@snapshot-audit/adapters';
import { CloudProvider } from '@snapshot-audit/shared';

export interface SnapshotClientSource {
  get(region: string): ISnapshotClient;
}

export class RegionClientPool implements SnapshotClientSource {
  private clients = new Map<string, ISnapshotClient>();
  private create: (region: string) => ISnapshotClient;

  constructor(create: (region: string) => ISnapshotClient) {
    this.create = create;
  }

  static forProvider(
    provider: CloudProvider,
    options: Omit<SnapshotClientOptions, 'region'>
  ): RegionClientPool {
    return new RegionClientPool((region) =>
      AdapterFactory.createSnapshotClient(provider, { ...options, region })
    );
  }

  get(region: string): ISnapshotClient {
    let client = this.clients.get(region);
    if (!client) {
      client = this.create(region);
      this.clients.set(region, client);
    }
    return client;
  }
}

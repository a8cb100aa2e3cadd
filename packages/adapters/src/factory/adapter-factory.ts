/**
 * Factory for creating snapshot clients based on configuration
 */
import { CloudProvider } from '@snapshot-audit/shared';
import type { ISnapshotClient, SnapshotClientOptions } from '../interfaces';
import { AlibabaEcsSnapshotClient, AwsEc2SnapshotClient } from '../providers';

export class AdapterFactory {
  /**
   * Create a region-scoped snapshot client
   */
  static createSnapshotClient(
    provider: CloudProvider,
    options: SnapshotClientOptions
  ): ISnapshotClient {
    switch (provider) {
      case CloudProvider.ALIBABA:
        return new AlibabaEcsSnapshotClient(options);
      case CloudProvider.AWS:
        return new AwsEc2SnapshotClient(options);
      default:
        throw new Error(`Unsupported snapshot provider: ${String(provider)}`);
    }
  }
}

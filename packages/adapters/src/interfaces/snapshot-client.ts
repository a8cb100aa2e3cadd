/**
 * Abstract interface for region-scoped snapshot providers
 */
import {
  CloudProvider,
  type CloudCredentials,
  type DiskPayload,
  type InstancePayload,
  type ListSnapshotsQuery,
  type SnapshotPage,
} from '@snapshot-audit/shared';

export interface ISnapshotClient {
  /**
   * Get the provider this client talks to
   */
  getProvider(): CloudProvider;

  /**
   * Get the region every call is scoped to
   */
  getRegion(): string;

  /**
   * List one page of snapshots
   */
  listSnapshots(query: ListSnapshotsQuery): Promise<SnapshotPage>;

  /**
   * Describe a single disk, or null when the provider does not know it
   */
  describeDisk(diskId: string): Promise<DiskPayload | null>;

  /**
   * Describe a single instance, or null when the provider does not know it
   */
  describeInstance(instanceId: string): Promise<InstancePayload | null>;
}

/**
 * Settings shared by every provider client
 */
export interface SnapshotClientOptions {
  region: string;
  credentials: CloudCredentials;
  /** Transport-level timeout for each request */
  timeoutMs?: number;
}

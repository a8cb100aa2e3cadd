/**
 * Cloud provider types and the payloads adapters hand to the auditor
 */

/**
 * Supported cloud providers
 */
export enum CloudProvider {
  ALIBABA = 'ALIBABA',
  AWS = 'AWS',
}

/**
 * Snapshot status filter for listings
 */
export type SnapshotStatusFilter = 'all' | 'progressing' | 'accomplished' | 'failed';

/**
 * Access key pair used to sign provider requests
 */
export interface CloudCredentials {
  accessKeyId: string;
  accessKeySecret: string;
}

/**
 * Snapshot as returned by a provider listing
 */
export interface SnapshotPayload {
  snapshotId: string;
  status?: string;
  /** Expected as YYYY-MM-DDTHH:MM:SSZ */
  creationTime: string;
  sourceDiskId?: string;
  sourceDiskType?: string;
  progress?: string;
  productCode?: string;
  usage?: string;
  /** Some regions send sizes as strings */
  sourceDiskSize?: string | number | null;
  actualSnapshotSize?: string | number | null;
}

/**
 * One page of a snapshot listing
 */
export interface SnapshotPage {
  snapshots: SnapshotPayload[];
  totalCount: number;
  pageNumber: number;
  pageSize: number;
}

/**
 * Query for a single listing page (page numbers start at 1)
 */
export interface ListSnapshotsQuery {
  pageNumber: number;
  pageSize: number;
  status?: SnapshotStatusFilter;
}

/**
 * Disk-to-instance attachment
 */
export interface DiskAttachment {
  instanceId?: string | null;
}

/**
 * Disk description
 */
export interface DiskPayload {
  diskId: string;
  /** Structured attachment list, absent when the provider does not report one */
  attachments?: DiskAttachment[] | null;
  /** Single attached instance exposed directly on the disk */
  instanceId?: string | null;
}

/**
 * Instance description
 */
export interface InstancePayload {
  instanceId: string;
  instanceName?: string | null;
}

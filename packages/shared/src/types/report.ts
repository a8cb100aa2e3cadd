/**
 * Backup audit report types
 *
 * Keys mirror the JSON document written to disk, so a report round-trips
 * through JSON.stringify/JSON.parse without any mapping.
 */

/**
 * Region-level verification outcome
 */
export type VerificationResult = 'success' | 'fail';

/**
 * Snapshot enriched with recency and attachment details
 */
export interface SnapshotRecord {
  snapshot_id: string;
  status: string;
  created_utc: string;
  source_disk_id: string;
  source_disk_type: string;
  progress: string;
  product_code: string;
  usage: string;
  source_disk_size_gb: number | null;
  actual_snapshot_size_gb: number | null;
  is_recent: boolean;
  /** First entry of attached_instance_ids */
  instance_id: string | null;
  /** First entry of attached_instance_names */
  instance_name: string | null;
  attached_instance_ids: string[];
  /** Aligned with attached_instance_ids; null where no name was resolved */
  attached_instance_names: (string | null)[];
}

/**
 * Marker entry left in place of the snapshot list when a region query fails
 */
export interface SnapshotErrorEntry {
  error: string;
}

export type RegionSnapshotEntry = SnapshotRecord | SnapshotErrorEntry;

/**
 * Verification summary for one region
 */
export interface BackupVerification {
  result: VerificationResult;
  recent_snapshot_count: number;
  cutoff_utc: string;
  lookback_hours: number;
  note?: string;
}

/**
 * Audit result for one region
 */
export interface RegionEntry {
  region: string;
  snapshots: RegionSnapshotEntry[];
  backup_verification: BackupVerification;
}

/**
 * Consolidated report for all audited regions
 */
export interface BackupReport {
  generated_at_utc: string;
  lookback_hours: number;
  account_access_key_id: string;
  regions_count: number;
  regions_with_recent_backups: number;
  total_recent_snapshots: number;
  entries: RegionEntry[];
}

export function isSnapshotErrorEntry(entry: RegionSnapshotEntry): entry is SnapshotErrorEntry {
  return 'error' in entry;
}

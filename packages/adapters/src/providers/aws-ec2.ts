/**
 * AWS EC2 (EBS) snapshot adapter
 */
import {
  EC2Client,
  DescribeSnapshotsCommand,
  type DescribeSnapshotsCommandInput,
  type DescribeSnapshotsCommandOutput,
  DescribeVolumesCommand,
  type DescribeVolumesCommandInput,
  type DescribeVolumesCommandOutput,
  DescribeInstancesCommand,
  type DescribeInstancesCommandInput,
  type DescribeInstancesCommandOutput,
  type Snapshot,
  type SnapshotState,
} from '@aws-sdk/client-ec2';
import {
  CloudProvider,
  type DiskPayload,
  type InstancePayload,
  type ListSnapshotsQuery,
  type SnapshotPage,
  type SnapshotPayload,
  type SnapshotStatusFilter,
  formatUtcSeconds,
} from '@snapshot-audit/shared';
import type { ISnapshotClient, SnapshotClientOptions } from '../interfaces';

/**
 * The three EC2 calls the adapter needs
 */
export interface Ec2Api {
  describeSnapshots(input: DescribeSnapshotsCommandInput): Promise<DescribeSnapshotsCommandOutput>;
  describeVolumes(input: DescribeVolumesCommandInput): Promise<DescribeVolumesCommandOutput>;
  describeInstances(input: DescribeInstancesCommandInput): Promise<DescribeInstancesCommandOutput>;
}

const STATE_BY_STATUS: Record<Exclude<SnapshotStatusFilter, 'all'>, SnapshotState> = {
  progressing: 'pending',
  accomplished: 'completed',
  failed: 'error',
};

/**
 * Wrap an EC2Client in the narrow Ec2Api shape
 */
export function createEc2Api(client: EC2Client): Ec2Api {
  return {
    describeSnapshots: (input) => client.send(new DescribeSnapshotsCommand(input)),
    describeVolumes: (input) => client.send(new DescribeVolumesCommand(input)),
    describeInstances: (input) => client.send(new DescribeInstancesCommand(input)),
  };
}

/**
 * Build an SDK client for one region
 */
export function createEc2SdkClient(options: SnapshotClientOptions): EC2Client {
  return new EC2Client({
    region: options.region,
    credentials: {
      accessKeyId: options.credentials.accessKeyId,
      secretAccessKey: options.credentials.accessKeySecret,
    },
    requestHandler: options.timeoutMs
      ? { requestTimeout: options.timeoutMs, connectionTimeout: options.timeoutMs }
      : undefined,
  });
}

function toSnapshotPayload(snapshot: Snapshot): SnapshotPayload {
  return {
    snapshotId: snapshot.SnapshotId ?? '',
    status: snapshot.State,
    creationTime: snapshot.StartTime ? formatUtcSeconds(snapshot.StartTime) : '',
    sourceDiskId: snapshot.VolumeId,
    progress: snapshot.Progress,
    sourceDiskSize: snapshot.VolumeSize,
  };
}

export class AwsEc2SnapshotClient implements ISnapshotClient {
  private region: string;
  private api: Ec2Api;
  // NextToken that opens each page after the first
  private pageTokens = new Map<number, string>();

  constructor(options: SnapshotClientOptions, api?: Ec2Api) {
    this.region = options.region;
    this.api = api ?? createEc2Api(createEc2SdkClient(options));
  }

  getProvider(): CloudProvider {
    return CloudProvider.AWS;
  }

  getRegion(): string {
    return this.region;
  }

  /**
   * EC2 pages by token; pages are numbered here so callers can use offset
   * pagination. A page with a successor reports one more snapshot than fits
   * through it; the last page reports the exact total.
   */
  async listSnapshots(query: ListSnapshotsQuery): Promise<SnapshotPage> {
    let nextToken: string | undefined;
    if (query.pageNumber > 1) {
      nextToken = this.pageTokens.get(query.pageNumber);
      if (!nextToken) {
        throw new Error(
          `Snapshot page ${query.pageNumber} requested before page ${query.pageNumber - 1}`
        );
      }
    }

    const status = query.status ?? 'all';
    const response = await this.api.describeSnapshots({
      OwnerIds: ['self'],
      MaxResults: query.pageSize,
      NextToken: nextToken,
      Filters: status === 'all' ? undefined : [{ Name: 'status', Values: [STATE_BY_STATUS[status]] }],
    });

    const snapshots = (response.Snapshots ?? []).map(toSnapshotPayload);
    let totalCount = (query.pageNumber - 1) * query.pageSize + snapshots.length;
    if (response.NextToken) {
      this.pageTokens.set(query.pageNumber + 1, response.NextToken);
      totalCount = query.pageNumber * query.pageSize + 1;
    }

    return {
      snapshots,
      totalCount,
      pageNumber: query.pageNumber,
      pageSize: query.pageSize,
    };
  }

  async describeDisk(diskId: string): Promise<DiskPayload | null> {
    const response = await this.api.describeVolumes({ VolumeIds: [diskId] });
    const volume = response.Volumes?.[0];
    if (!volume) {
      return null;
    }

    const attachments = (volume.Attachments ?? []).map((attachment) => ({
      instanceId: attachment.InstanceId ?? null,
    }));
    return {
      diskId: volume.VolumeId ?? diskId,
      attachments: attachments.length > 0 ? attachments : null,
    };
  }

  async describeInstance(instanceId: string): Promise<InstancePayload | null> {
    const response = await this.api.describeInstances({ InstanceIds: [instanceId] });
    const instance = response.Reservations?.[0]?.Instances?.[0];
    if (!instance) {
      return null;
    }

    const nameTag = instance.Tags?.find((tag) => tag.Key === 'Name');
    return {
      instanceId: instance.InstanceId ?? instanceId,
      instanceName: nameTag?.Value ?? null,
    };
  }
}

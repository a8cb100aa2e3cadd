/**
 * Alibaba Cloud ECS snapshot adapter
 */
import Ecs20140526, * as $Ecs20140526 from '@alicloud/ecs20140526';
import * as $OpenApi from '@alicloud/openapi-client';
import { z } from 'zod';
import {
  CloudProvider,
  type DiskPayload,
  type InstancePayload,
  type ListSnapshotsQuery,
  type SnapshotPage,
} from '@snapshot-audit/shared';
import type { ISnapshotClient, SnapshotClientOptions } from '../interfaces';

/**
 * The three ECS OpenAPI calls the adapter needs; each resolves to the response body
 */
export interface EcsApi {
  describeSnapshots(request: {
    regionId: string;
    status: string;
    pageSize: number;
    pageNumber: number;
  }): Promise<unknown>;
  describeDisks(request: {
    regionId: string;
    diskIds: string;
    pageSize: number;
    pageNumber: number;
  }): Promise<unknown>;
  describeInstances(request: {
    regionId: string;
    instanceIds: string;
    pageSize: number;
    pageNumber: number;
  }): Promise<unknown>;
}

const optionalString = z.string().nullish();

// Size fields arrive as strings or numbers depending on region
const sizeField = z
  .unknown()
  .transform((value) => (typeof value === 'string' || typeof value === 'number' ? value : null));

const SnapshotSchema = z.object({
  snapshotId: z.string(),
  status: optionalString,
  creationTime: z.string(),
  sourceDiskId: optionalString,
  sourceDiskType: optionalString,
  progress: optionalString,
  productCode: optionalString,
  usage: optionalString,
  sourceDiskSize: sizeField,
  actualSnapshotSize: sizeField,
});

const SnapshotsBodySchema = z.object({
  totalCount: z.number().nullish(),
  snapshots: z
    .object({
      snapshot: z.array(SnapshotSchema).nullish(),
    })
    .nullish(),
});

const AttachmentSchema = z
  .object({
    instanceId: optionalString,
    InstanceId: optionalString,
  })
  .transform((attachment) => ({
    instanceId: attachment.instanceId ?? attachment.InstanceId ?? null,
  }));

const DisksBodySchema = z.object({
  disks: z
    .object({
      disk: z
        .array(
          z.object({
            diskId: optionalString,
            instanceId: optionalString,
            attachments: z
              .object({
                attachment: z.array(AttachmentSchema).nullish(),
              })
              .nullish(),
          })
        )
        .nullish(),
    })
    .nullish(),
});

const InstancesBodySchema = z.object({
  instances: z
    .object({
      instance: z
        .array(
          z.object({
            instanceId: optionalString,
            instanceName: optionalString,
          })
        )
        .nullish(),
    })
    .nullish(),
});

/**
 * Wrap the ECS SDK client in the narrow EcsApi shape
 */
export function createEcsApi(client: Ecs20140526): EcsApi {
  return {
    describeSnapshots: async (request) =>
      (await client.describeSnapshots(new $Ecs20140526.DescribeSnapshotsRequest(request))).body,
    describeDisks: async (request) =>
      (await client.describeDisks(new $Ecs20140526.DescribeDisksRequest(request))).body,
    describeInstances: async (request) =>
      (await client.describeInstances(new $Ecs20140526.DescribeInstancesRequest(request))).body,
  };
}

/**
 * Build an SDK client for one region using the access key pair directly
 */
export function createEcsSdkClient(options: SnapshotClientOptions): Ecs20140526 {
  const config = new $OpenApi.Config({
    accessKeyId: options.credentials.accessKeyId,
    accessKeySecret: options.credentials.accessKeySecret,
    regionId: options.region,
    endpoint: `ecs.${options.region}.aliyuncs.com`,
    readTimeout: options.timeoutMs,
    connectTimeout: options.timeoutMs,
  });
  return new Ecs20140526(config);
}

export class AlibabaEcsSnapshotClient implements ISnapshotClient {
  private region: string;
  private api: EcsApi;

  constructor(options: SnapshotClientOptions, api?: EcsApi) {
    this.region = options.region;
    this.api = api ?? createEcsApi(createEcsSdkClient(options));
  }

  getProvider(): CloudProvider {
    return CloudProvider.ALIBABA;
  }

  getRegion(): string {
    return this.region;
  }

  async listSnapshots(query: ListSnapshotsQuery): Promise<SnapshotPage> {
    const body = SnapshotsBodySchema.parse(
      await this.api.describeSnapshots({
        regionId: this.region,
        status: query.status ?? 'all',
        pageSize: query.pageSize,
        pageNumber: query.pageNumber,
      })
    );

    const snapshots = (body.snapshots?.snapshot ?? []).map((snapshot) => ({
      snapshotId: snapshot.snapshotId,
      status: snapshot.status ?? undefined,
      creationTime: snapshot.creationTime,
      sourceDiskId: snapshot.sourceDiskId ?? undefined,
      sourceDiskType: snapshot.sourceDiskType ?? undefined,
      progress: snapshot.progress ?? undefined,
      productCode: snapshot.productCode ?? undefined,
      usage: snapshot.usage ?? undefined,
      sourceDiskSize: snapshot.sourceDiskSize,
      actualSnapshotSize: snapshot.actualSnapshotSize,
    }));

    return {
      snapshots,
      totalCount: body.totalCount ?? 0,
      pageNumber: query.pageNumber,
      pageSize: query.pageSize,
    };
  }

  async describeDisk(diskId: string): Promise<DiskPayload | null> {
    const body = DisksBodySchema.parse(
      await this.api.describeDisks({
        regionId: this.region,
        diskIds: JSON.stringify([diskId]),
        pageSize: 10,
        pageNumber: 1,
      })
    );

    const disk = body.disks?.disk?.[0];
    if (!disk) {
      return null;
    }

    const attachments = disk.attachments?.attachment;
    return {
      diskId: disk.diskId ?? diskId,
      attachments: attachments && attachments.length > 0 ? attachments : null,
      instanceId: disk.instanceId ?? null,
    };
  }

  async describeInstance(instanceId: string): Promise<InstancePayload | null> {
    const body = InstancesBodySchema.parse(
      await this.api.describeInstances({
        regionId: this.region,
        instanceIds: JSON.stringify([instanceId]),
        pageSize: 10,
        pageNumber: 1,
      })
    );

    const instance = body.instances?.instance?.[0];
    if (!instance) {
      return null;
    }

    return {
      instanceId: instance.instanceId ?? instanceId,
      instanceName: instance.instanceName ?? null,
    };
  }
}

import { describe, it, expect, vi } from 'vitest';
import { CloudProvider } from '@snapshot-audit/shared';
import { AlibabaEcsSnapshotClient, type EcsApi } from '../alibaba-ecs';

const OPTIONS = {
  region: 'cn-hangzhou',
  credentials: { accessKeyId: 'test-key-id', accessKeySecret: 'test-secret' },
};

function createApi(overrides: Partial<EcsApi> = {}): EcsApi {
  return {
    describeSnapshots: vi.fn(async () => ({})),
    describeDisks: vi.fn(async () => ({})),
    describeInstances: vi.fn(async () => ({})),
    ...overrides,
  };
}

describe('AlibabaEcsSnapshotClient', () => {
  it('reports its provider and region', () => {
    const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi());

    expect(client.getProvider()).toBe(CloudProvider.ALIBABA);
    expect(client.getRegion()).toBe('cn-hangzhou');
  });

  describe('listSnapshots', () => {
    it('requests the page and maps snapshot fields', async () => {
      const describeSnapshots = vi.fn(async () => ({
        totalCount: 51,
        pageNumber: 2,
        snapshots: {
          snapshot: [
            {
              snapshotId: 's-1',
              status: 'accomplished',
              creationTime: '2024-05-01T10:00:00Z',
              sourceDiskId: 'd-1',
              sourceDiskType: 'System',
              progress: '100%',
              productCode: '',
              usage: 'image',
              sourceDiskSize: '40',
              actualSnapshotSize: 12,
              encrypted: false,
            },
          ],
        },
      }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeSnapshots }));

      const page = await client.listSnapshots({ pageNumber: 2, pageSize: 50 });

      expect(describeSnapshots).toHaveBeenCalledWith({
        regionId: 'cn-hangzhou',
        status: 'all',
        pageSize: 50,
        pageNumber: 2,
      });
      expect(page).toEqual({
        totalCount: 51,
        pageNumber: 2,
        pageSize: 50,
        snapshots: [
          {
            snapshotId: 's-1',
            status: 'accomplished',
            creationTime: '2024-05-01T10:00:00Z',
            sourceDiskId: 'd-1',
            sourceDiskType: 'System',
            progress: '100%',
            productCode: '',
            usage: 'image',
            sourceDiskSize: '40',
            actualSnapshotSize: 12,
          },
        ],
      });
    });

    it('treats a missing snapshot list and total as an empty page', async () => {
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi());

      const page = await client.listSnapshots({ pageNumber: 1, pageSize: 50, status: 'accomplished' });

      expect(page.snapshots).toEqual([]);
      expect(page.totalCount).toBe(0);
    });

    it('replaces size values of an unexpected type with null', async () => {
      const describeSnapshots = vi.fn(async () => ({
        totalCount: 1,
        snapshots: {
          snapshot: [
            {
              snapshotId: 's-1',
              creationTime: '2024-05-01T10:00:00Z',
              sourceDiskSize: { value: 40 },
            },
          ],
        },
      }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeSnapshots }));

      const page = await client.listSnapshots({ pageNumber: 1, pageSize: 50 });

      expect(page.snapshots[0].sourceDiskSize).toBeNull();
      expect(page.snapshots[0].actualSnapshotSize).toBeNull();
    });

    it('rejects snapshots without a creation time', async () => {
      const describeSnapshots = vi.fn(async () => ({
        totalCount: 1,
        snapshots: { snapshot: [{ snapshotId: 's-1' }] },
      }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeSnapshots }));

      await expect(client.listSnapshots({ pageNumber: 1, pageSize: 50 })).rejects.toThrow();
    });
  });

  describe('describeDisk', () => {
    it('queries exactly one disk id as a JSON array', async () => {
      const describeDisks = vi.fn(async () => ({ disks: { disk: [] } }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeDisks }));

      await client.describeDisk('d-1');

      expect(describeDisks).toHaveBeenCalledWith({
        regionId: 'cn-hangzhou',
        diskIds: '["d-1"]',
        pageSize: 10,
        pageNumber: 1,
      });
    });

    it('returns null when the disk is unknown', async () => {
      const client = new AlibabaEcsSnapshotClient(
        OPTIONS,
        createApi({ describeDisks: vi.fn(async () => ({ disks: { disk: [] } })) })
      );

      expect(await client.describeDisk('d-1')).toBeNull();
    });

    it('normalizes both attachment field spellings', async () => {
      const describeDisks = vi.fn(async () => ({
        disks: {
          disk: [
            {
              diskId: 'd-1',
              attachments: {
                attachment: [{ instanceId: 'i-b' }, { InstanceId: 'i-a' }, {}],
              },
            },
          ],
        },
      }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeDisks }));

      expect(await client.describeDisk('d-1')).toEqual({
        diskId: 'd-1',
        attachments: [{ instanceId: 'i-b' }, { instanceId: 'i-a' }, { instanceId: null }],
        instanceId: null,
      });
    });

    it('exposes the direct instance id when the attachment list is empty', async () => {
      const describeDisks = vi.fn(async () => ({
        disks: {
          disk: [{ diskId: 'd-1', instanceId: 'i-direct', attachments: { attachment: [] } }],
        },
      }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeDisks }));

      expect(await client.describeDisk('d-1')).toEqual({
        diskId: 'd-1',
        attachments: null,
        instanceId: 'i-direct',
      });
    });
  });

  describe('describeInstance', () => {
    it('returns the instance name', async () => {
      const describeInstances = vi.fn(async () => ({
        instances: { instance: [{ instanceId: 'i-a', instanceName: 'web-01' }] },
      }));
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi({ describeInstances }));

      expect(await client.describeInstance('i-a')).toEqual({ instanceId: 'i-a', instanceName: 'web-01' });
      expect(describeInstances).toHaveBeenCalledWith({
        regionId: 'cn-hangzhou',
        instanceIds: '["i-a"]',
        pageSize: 10,
        pageNumber: 1,
      });
    });

    it('returns null when the instance is unknown', async () => {
      const client = new AlibabaEcsSnapshotClient(OPTIONS, createApi());

      expect(await client.describeInstance('i-a')).toBeNull();
    });
  });
});

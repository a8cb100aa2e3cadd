/**
 * Wire a report builder from validated configuration
 */
import { type AuditConfig, type Logger, logger } from '@snapshot-audit/shared';
import { LookupCache } from '../cache/lookup-cache';
import { RegionClientPool, type SnapshotClientSource } from '../clients/region-client-pool';
import { AttachmentResolver } from '../resolvers/attachment-resolver';
import { InstanceNameResolver } from '../resolvers/instance-name-resolver';
import { RegionAuditor } from './region-auditor';
import { ReportBuilder } from './report-builder';

export interface ReportBuilderDeps {
  /** Defaults to provider clients built from the config */
  clients?: SnapshotClientSource;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Every call gets its own lookup caches, which live as long as the builder
 */
export function createReportBuilder(config: AuditConfig, deps: ReportBuilderDeps = {}): ReportBuilder {
  const log = deps.logger ?? logger;
  const clients =
    deps.clients ??
    RegionClientPool.forProvider(config.provider, {
      credentials: config.credentials,
      timeoutMs: config.requestTimeoutMs,
    });

  const auditor = new RegionAuditor({
    clients,
    attachments: new AttachmentResolver(clients, new LookupCache<string[]>(), log),
    names: new InstanceNameResolver(clients, new LookupCache<string>(), log),
    pageSize: config.pageSize,
    clock: deps.clock,
    logger: log,
  });

  return new ReportBuilder({
    auditor,
    accessKeyId: config.credentials.accessKeyId,
    regionConcurrency: config.regionConcurrency,
    clock: deps.clock,
    logger: log,
  });
}

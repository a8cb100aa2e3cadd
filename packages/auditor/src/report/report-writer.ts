/**
 * Report serialization and persistence
 */
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { BackupReport } from '@snapshot-audit/shared';

/**
 * Two-space indented JSON; non-ASCII text is written as-is
 */
export function serializeReport(report: BackupReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Write the report, creating parent directories as needed
 */
export async function saveJsonReport(report: BackupReport, outputPath: string): Promise<string> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, serializeReport(report), 'utf-8');
  return outputPath;
}

/**
 * Scan Writer
 * Saves scan reports to disk as JSON
 */

import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { sha256Short, stableStringify } from '@/utils/hash';
import type { ScanReport } from '@/scoring/engine';

const logger = createChildLogger('scan_writer');

export interface WriteResult {
  scanId: string;
  filePath: string;
  contentHash: string;
}

export function writeScanReport(
  report: ScanReport,
  outDir: string = join(process.cwd(), 'data', 'scans')
): WriteResult {
  if (!existsSync(outDir)) {
    mkdirSync(outDir, { recursive: true });
  }

  const filePath = join(outDir, `${report.scanId}.json`);
  const contentHash = sha256Short(stableStringify(report), 16);
  writeFileSync(filePath, JSON.stringify(report, null, 2), 'utf-8');

  logger.info({ scanId: report.scanId, filePath }, 'Scan report written');

  return { scanId: report.scanId, filePath, contentHash };
}

/**
 * Plain-text scan summary for the CLI and logs.
 * The count lines are always printed, including for empty result sets.
 */

import type { RankedSymbol, ScanReport } from '@/scoring/engine';

function formatSigned(value: number, decimals: number): string {
  const fixed = value.toFixed(decimals);
  return value > 0 ? `+${fixed}` : fixed;
}

export function formatRankedLine(item: RankedSymbol): string {
  const signal = item.latestSignal
    ? `${item.latestSignal.signalType} on ${item.latestSignal.date}`
    : 'no entry signal';
  return (
    `${item.rank}. ${item.symbol} composite ${item.compositeScore.toFixed(1)}` +
    ` | RS ${formatSigned(item.rsValue, 2)} (rating ${item.rsRating})` +
    ` | trend ${item.trendScore.toFixed(1)} | ${signal}`
  );
}

export function formatScanSummary(report: ScanReport): string[] {
  const { stats, marketTrend } = report;
  const lines = [
    `Scan ${report.scanId} | universe ${report.universe} | benchmark ${report.benchmark}`,
    `Market: ${marketTrend.direction} (score ${marketTrend.score.toFixed(1)}${marketTrend.degraded ? ', degraded' : ''})`,
    `Analyzed: ${stats.analyzed} | Failed: ${stats.failed} | Rejected: ${stats.rejected} | Opportunities found: ${stats.accepted}`,
  ];

  if (report.ranked.length === 0) {
    lines.push('No symbols passed the screening thresholds.');
    return lines;
  }
  return lines.concat(report.ranked.map(formatRankedLine));
}

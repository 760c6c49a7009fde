/**
 * Shared CLI rendering utilities for consistent output formatting
 */

import type { StageReport } from '@/workflows/pipeline';
import type { SecretSyncReport } from '@/workflows/secrets/synchronizer';

const STATUS_ICONS: Record<StageReport['status'], string> = {
  succeeded: '✅',
  warned: '⚠️ ',
  failed: '❌',
  skipped: '⏭️ ',
};

/**
 * One line per stage, e.g. `✅ package-chart (1204ms)`
 */
export function renderStages(reports: readonly StageReport[]): string[] {
  return reports.map((report) => {
    const icon = STATUS_ICONS[report.status];
    const detail = report.error ?? report.warning;
    const timing = report.status === 'skipped' ? 'skipped' : `${report.durationMs}ms`;
    return detail
      ? `${icon} ${report.name} (${timing}): ${detail}`
      : `${icon} ${report.name} (${timing})`;
  });
}

export function renderSecretReport(report: SecretSyncReport): string[] {
  const lines = [
    `Created: ${report.created.length > 0 ? report.created.join(', ') : 'none'}`,
    `Already present: ${report.skipped.length > 0 ? report.skipped.join(', ') : 'none'}`,
  ];

  if (report.rbac === 'not-requested') {
    lines.push('Vault role assignment: not requested');
  } else if (report.rbac.ok) {
    lines.push(`Vault role assignment: ${report.rbac.value.status}`);
  } else {
    lines.push(`Vault role assignment: failed (${report.rbac.error})`);
  }
  return lines;
}

import type { SessionReport } from './dispatch/session.js';

export const EXIT_CODE_FAILURE = 1;
// Distinct so schedulers can page someone instead of blindly re-running.
export const EXIT_CODE_DELIVERED_NOT_RECORDED = 3;

export function exitCodeFor(report: Pick<SessionReport, 'ok' | 'reason'>): number {
  if (report.ok) {
    return 0;
  }
  if (report.reason === 'delivered_not_recorded') {
    return EXIT_CODE_DELIVERED_NOT_RECORDED;
  }
  return EXIT_CODE_FAILURE;
}

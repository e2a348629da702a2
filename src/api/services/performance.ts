/**
 * Performance summaries live on the io host and identify the member through
 * the koji-* headers rather than the path.
 */

import { unwrapArray } from '../../../lib/typesafe';
import { PerformanceSummaryDetail, PerformanceSummaryList } from '../schemas';
import { segment, type ApiSession } from '../session';

export const DEFAULT_SUMMARY_LIMIT = 30;

export function createPerformanceApi(session: ApiSession) {
  const memberHeaders = (): Record<string, string> => ({
    'koji-member-id': session.user.memberUuid,
    'koji-member-email': session.user.email,
  });

  return {
    getPerformanceSummaries: async (limit: number = DEFAULT_SUMMARY_LIMIT): Promise<PerformanceSummaryList> => {
      const payload = await session.request({
        method: 'GET',
        host: 'io',
        path: '/v1/performance-summaries',
        params: { limit },
        headers: memberHeaders(),
      });
      return PerformanceSummaryList.parse(unwrapArray(payload, ['items']));
    },

    getPerformanceSummary: async (summaryId: string): Promise<PerformanceSummaryDetail> => {
      const payload = await session.request({
        method: 'GET',
        host: 'io',
        path: `/v1/performance-summaries/${segment(summaryId)}`,
        headers: memberHeaders(),
      });
      return PerformanceSummaryDetail.parse(payload);
    },
  };
}

export type PerformanceApi = ReturnType<typeof createPerformanceApi>;

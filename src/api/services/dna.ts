import { unwrapArray } from '../../../lib/typesafe';
import { HrHistoryList, Telemetry, TelemetryMaxHr } from '../schemas';
import type { ApiSession } from '../session';

export const DEFAULT_MAX_DATA_POINTS = 120;

/** Heart-rate settings and in-class telemetry from the dna host. */
export function createDnaApi(session: ApiSession) {
  return {
    getMaxHr: async (): Promise<TelemetryMaxHr> => {
      const payload = await session.request({
        method: 'GET',
        host: 'dna',
        path: '/v1/physVars/maxHr',
        params: { memberUuid: session.user.memberUuid },
      });
      return TelemetryMaxHr.parse(payload);
    },

    getHrHistory: async (): Promise<HrHistoryList> => {
      const payload = await session.request({
        method: 'GET',
        host: 'dna',
        path: '/v1/physVars/maxHr/history',
        params: { memberUuid: session.user.memberUuid },
      });
      return HrHistoryList.parse(unwrapArray(payload, ['history']), { memberUuid: session.user.memberUuid });
    },

    /**
     * Per-interval heart rate, splat and calorie samples for one class
     */
    getTelemetry: async (classHistoryUuid: string, maxDataPoints: number = DEFAULT_MAX_DATA_POINTS): Promise<Telemetry> => {
      const payload = await session.request({
        method: 'GET',
        host: 'dna',
        path: '/v1/performance/summary',
        params: { classHistoryUuid, maxDataPoints },
      });
      return Telemetry.parse(payload);
    },
  };
}

export type DnaApi = ReturnType<typeof createDnaApi>;

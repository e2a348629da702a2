/**
 * Studios API Service
 *
 * Studio detail, geo search, favorites and the services a studio sells.
 */

import { isRecord, unwrap, unwrapArray } from '../../../lib/typesafe';
import { StudioDetail, StudioDetailList, StudioServiceList } from '../schemas';
import { segment, type ApiSession } from '../session';

export const GEO_SEARCH_PAGE_SIZE = 50;
export const DEFAULT_SEARCH_DISTANCE_MILES = 50;

export type GeoSearch = {
  /** Defaults to the home studio's coordinates. */
  latitude?: number;
  longitude?: number;
  distance?: number;
};

function readTotalCount(payload: unknown): number | null {
  const data = unwrap(payload, ['data']);
  const pagination = isRecord(data) ? data.pagination : undefined;
  if (!isRecord(pagination)) return null;
  const total = pagination.totalCount;
  return typeof total === 'number' ? total : null;
}

export function createStudiosApi(session: ApiSession) {
  const studiosApi = {
    /**
     * Detail for one studio; the member's home studio when no UUID is given
     */
    getStudioDetail: async (studioUuid?: string): Promise<StudioDetail> => {
      const uuid = studioUuid ?? session.homeStudioUuid;
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: `/mobile/v1/studios/${segment(uuid)}`,
      });
      return StudioDetail.parse(unwrap(payload, ['data']));
    },

    /**
     * Every studio within `distance` miles, fetched page by page
     */
    searchStudiosByGeo: async (search: GeoSearch = {}): Promise<StudioDetailList> => {
      const home = session.homeStudio.location;
      const latitude = search.latitude ?? home.latitude;
      const longitude = search.longitude ?? home.longitude;
      const distance = search.distance ?? DEFAULT_SEARCH_DISTANCE_MILES;

      const studios: StudioDetail[] = [];
      let totalCount: number | null = null;
      for (let pageIndex = 1; ; pageIndex += 1) {
        const payload = await session.request({
          method: 'GET',
          host: 'default',
          path: '/mobile/v1/studios',
          params: { latitude, longitude, distance, pageIndex, pageSize: GEO_SEARCH_PAGE_SIZE },
        });
        const page = StudioDetailList.parse(unwrapArray(payload, ['data', 'studios']));
        totalCount ??= readTotalCount(payload);
        studios.push(...page.items);

        const exhausted = page.length < GEO_SEARCH_PAGE_SIZE;
        if (exhausted || (totalCount !== null && studios.length >= totalCount)) break;
      }

      return StudioDetailList.from(studios, { latitude, longitude, distance, totalCount: totalCount ?? studios.length });
    },

    getFavoriteStudios: async (): Promise<StudioDetailList> => {
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: `/member/members/${segment(session.user.memberUuid)}/favorite-studios`,
      });
      return StudioDetailList.parse(unwrapArray(payload, ['data']));
    },

    getStudioServices: async (studioUuid?: string): Promise<StudioServiceList> => {
      const uuid = studioUuid ?? session.homeStudioUuid;
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: `/member/studios/${segment(uuid)}/services`,
      });
      return StudioServiceList.parse(unwrapArray(payload, ['data']));
    },
  };

  return studiosApi;
}

export type StudiosApi = ReturnType<typeof createStudiosApi>;

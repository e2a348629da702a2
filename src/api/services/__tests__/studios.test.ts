import { GEO_SEARCH_PAGE_SIZE } from '@/src/api/services/studios';
import { jsonResponse, type RecordedRequest } from '@/test-utils/fakeTransport';
import { HOME_STUDIO_UUID, MEMBER_UUID, OTHER_STUDIO_UUID, studioDetailJson } from '@/test-utils/fixtures';
import { createTestApi } from '@/test-utils/session';

const studiosNamed = (prefix: string, count: number) =>
  Array.from({ length: count }, (_, index) =>
    studioDetailJson({ studioUUId: `${prefix}-${index}`, studioName: `${prefix} ${index}` })
  );

describe('studiosApi', () => {
  describe('getStudioDetail', () => {
    test('loads the home studio during bootstrap', async () => {
      const { api, transport } = await createTestApi();

      expect(transport.requestsTo(`/mobile/v1/studios/${HOME_STUDIO_UUID}`)).toHaveLength(1);
      expect(api.homeStudio.name).toBe('Springfield Central');
      expect(api.homeStudioUuid).toBe(HOME_STUDIO_UUID);
    });

    test('fetches another studio by UUID', async () => {
      const { api, transport } = await createTestApi();
      transport.on(
        'GET',
        `/mobile/v1/studios/${OTHER_STUDIO_UUID}`,
        jsonResponse(200, { data: studioDetailJson({ studioUUId: OTHER_STUDIO_UUID, studioName: 'Shelbyville' }) })
      );

      const studio = await api.studios.getStudioDetail(OTHER_STUDIO_UUID);

      expect(studio.name).toBe('Shelbyville');
      expect(studio.location.city).toBe('Springfield');
    });
  });

  describe('searchStudiosByGeo', () => {
    test('pages through results around the home studio', async () => {
      const { api, transport } = await createTestApi();
      const pages: Record<string, unknown[]> = {
        '1': studiosNamed('near', GEO_SEARCH_PAGE_SIZE),
        '2': studiosNamed('far', 2),
      };
      transport.on('GET', '/mobile/v1/studios', (request: RecordedRequest) =>
        jsonResponse(200, {
          data: {
            studios: pages[request.query.get('pageIndex') ?? ''] ?? [],
            pagination: { pageIndex: Number(request.query.get('pageIndex')), totalCount: 52 },
          },
        })
      );

      const studios = await api.studios.searchStudiosByGeo();

      const requests = transport.requestsTo('/mobile/v1/studios');
      expect(requests.map((request) => request.query.toString())).toEqual([
        'latitude=40.7&longitude=-74&distance=50&pageIndex=1&pageSize=50',
        'latitude=40.7&longitude=-74&distance=50&pageIndex=2&pageSize=50',
      ]);
      expect(studios.length).toBe(52);
      expect(studios.items[51]?.name).toBe('far 1');
      expect(studios.meta).toEqual({ latitude: 40.7, longitude: -74, distance: 50, totalCount: 52 });
    });

    test('stops after a short page when no total is reported', async () => {
      const { api, transport } = await createTestApi();
      transport.on('GET', '/mobile/v1/studios', jsonResponse(200, { data: { studios: studiosNamed('near', 3) } }));

      const studios = await api.studios.searchStudiosByGeo({ latitude: 51.5, longitude: -0.12, distance: 5 });

      expect(transport.requestsTo('/mobile/v1/studios')).toHaveLength(1);
      expect(studios.meta).toEqual({ latitude: 51.5, longitude: -0.12, distance: 5, totalCount: 3 });
    });

    test('stops once the reported total is reached', async () => {
      const { api, transport } = await createTestApi();
      transport.on(
        'GET',
        '/mobile/v1/studios',
        jsonResponse(200, {
          data: { studios: studiosNamed('near', GEO_SEARCH_PAGE_SIZE), pagination: { totalCount: GEO_SEARCH_PAGE_SIZE } },
        })
      );

      const studios = await api.studios.searchStudiosByGeo();

      expect(transport.requestsTo('/mobile/v1/studios')).toHaveLength(1);
      expect(studios.length).toBe(GEO_SEARCH_PAGE_SIZE);
    });
  });

  describe('getFavoriteStudios', () => {
    test('lists the member favorites', async () => {
      const { api, transport } = await createTestApi();
      transport.on(
        'GET',
        `/member/members/${MEMBER_UUID}/favorite-studios`,
        jsonResponse(200, { data: [studioDetailJson({ studioUUId: OTHER_STUDIO_UUID, studioName: 'Shelbyville' })] })
      );

      const favorites = await api.studios.getFavoriteStudios();

      expect(favorites.items.map((studio) => studio.studioUuid)).toEqual([OTHER_STUDIO_UUID]);
      expect(favorites.toTable().headers).toEqual(['Name', 'Address', 'City', 'Location State', 'Distance', 'Status']);
    });
  });

  describe('getStudioServices', () => {
    test('lists what the home studio sells', async () => {
      const { api, transport } = await createTestApi();
      transport.on(
        'GET',
        `/member/studios/${HOME_STUDIO_UUID}/services`,
        jsonResponse(200, {
          data: [
            { serviceUUId: 'service-1', name: 'Premier', price: '159.00', qty: 1, current: true },
            { serviceUUId: 'service-2', name: '10 Class Pack', price: '200.00', qty: 10 },
          ],
        })
      );

      const services = await api.studios.getStudioServices();

      expect(services.toTable()).toEqual({
        headers: ['Name', 'Price', 'Qty', 'Current'],
        rows: [
          ['Premier', '159.00', '1', 'true'],
          ['10 Class Pack', '200.00', '10', 'false'],
        ],
      });
    });
  });
});

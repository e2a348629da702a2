import { jsonResponse } from '@/test-utils/fakeTransport';
import { MEMBER_EMAIL, MEMBER_UUID } from '@/test-utils/fixtures';
import { createTestApi } from '@/test-utils/session';

const summary = (id: string, startsAt: string) => ({
  id,
  details: { calories_burned: 500, splat_points: 12, heart_rate: { avg_hr: 140 } },
  ratable: false,
  class: { ot_base_class_uuid: 'class-0001', starts_at_local: startsAt, name: 'Orange 60' },
  studio: { uuid: 'studio-home', name: 'Springfield Central' },
});

describe('performanceApi', () => {
  test('identifies the member through koji headers', async () => {
    const { api, transport } = await createTestApi();
    transport.on('GET', '/v1/performance-summaries', jsonResponse(200, { items: [] }));

    await api.performance.getPerformanceSummaries();

    const [request] = transport.requestsTo('/v1/performance-summaries');
    expect(request?.host).toBe('api.orangetheory.io');
    expect(request?.query.toString()).toBe('limit=30');
    expect(request?.headers).toMatchObject({
      'koji-member-id': MEMBER_UUID,
      'koji-member-email': MEMBER_EMAIL,
    });
    expect(request?.headers['Authorization']).toMatch(/^Bearer /);
  });

  test('lists summaries with the requested limit', async () => {
    const { api, transport } = await createTestApi();
    transport.on(
      'GET',
      '/v1/performance-summaries',
      jsonResponse(200, { items: [summary('summary-2', '2024-01-03T09:00:00'), summary('summary-1', '2024-01-01T09:00:00')] })
    );

    const summaries = await api.performance.getPerformanceSummaries(2);

    expect(transport.requestsTo('/v1/performance-summaries')[0]?.query.get('limit')).toBe('2');
    expect(summaries.items.map((entry) => entry.id)).toEqual(['summary-2', 'summary-1']);
    expect(summaries.items[0]?.details.caloriesBurned).toBe(500);
  });

  test('fetches one summary by id', async () => {
    const { api, transport } = await createTestApi();
    transport.on(
      'GET',
      '/v1/performance-summaries/summary-1',
      jsonResponse(200, { ...summary('summary-1', '2024-01-01T09:00:00'), class_history_uuid: 'history-1' })
    );

    const detail = await api.performance.getPerformanceSummary('summary-1');

    expect(detail.classHistoryUuid).toBe('history-1');
    expect(detail.otfClass?.startsAt.toISOString()).toBe('2024-01-01T09:00:00.000Z');
    expect(transport.requestsTo('/v1/performance-summaries/summary-1')[0]?.headers['koji-member-id']).toBe(MEMBER_UUID);
  });
});

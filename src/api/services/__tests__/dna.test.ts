import { ValidationError } from '@/lib/errors';
import { jsonResponse } from '@/test-utils/fakeTransport';
import { MEMBER_UUID } from '@/test-utils/fixtures';
import { createTestApi } from '@/test-utils/session';

describe('dnaApi', () => {
  test('reads the current max heart rate', async () => {
    const { api, transport } = await createTestApi();
    transport.on(
      'GET',
      '/v1/physVars/maxHr',
      jsonResponse(200, { memberUuid: MEMBER_UUID, maxHr: { type: 'AUTO', value: 186 } })
    );

    const maxHr = await api.dna.getMaxHr();

    expect(maxHr.maxHr.value).toBe(186);
    const [request] = transport.requestsTo('/v1/physVars/maxHr');
    expect(request?.host).toBe('api.yuzu.orangetheory.com');
    expect(request?.query.get('memberUuid')).toBe(MEMBER_UUID);
  });

  test('lists max heart rate history', async () => {
    const { api, transport } = await createTestApi();
    transport.on(
      'GET',
      '/v1/physVars/maxHr/history',
      jsonResponse(200, {
        memberUuid: MEMBER_UUID,
        history: [
          { maxHrType: 'AUTO', maxHrValue: 186, changeSource: 'system', assignedAt: '2023-11-01T00:00:00Z' },
          { maxHrType: 'MANUAL', maxHrValue: 180, changeSource: 'member', assignedAt: '2023-12-01T00:00:00Z' },
        ],
      })
    );

    const history = await api.dna.getHrHistory();

    expect(history.meta).toEqual({ memberUuid: MEMBER_UUID });
    expect(history.toTable()).toEqual({
      headers: ['Assigned At', 'Max HR Type', 'Max HR', 'Change Source'],
      rows: [
        ['2023-11-01T00:00:00.000Z', 'AUTO', '186', 'system'],
        ['2023-12-01T00:00:00.000Z', 'MANUAL', '180', 'member'],
      ],
    });
  });

  test('requests telemetry for one class', async () => {
    const { api, transport } = await createTestApi();
    transport.on(
      'GET',
      '/v1/performance/summary',
      jsonResponse(200, {
        memberUuid: MEMBER_UUID,
        classHistoryUuid: 'history-1',
        telemetry: [{ relativeTimestamp: 0, hr: 88 }],
      })
    );

    const telemetry = await api.dna.getTelemetry('history-1', 60);

    expect(transport.requestsTo('/v1/performance/summary')[0]?.query.toString()).toBe(
      'classHistoryUuid=history-1&maxDataPoints=60'
    );
    expect(telemetry.telemetry[0]?.hr).toBe(88);
  });

  test('rejects telemetry without a class history id', async () => {
    const { api, transport } = await createTestApi();
    transport.on('GET', '/v1/performance/summary', jsonResponse(200, { memberUuid: MEMBER_UUID }));

    await expect(api.dna.getTelemetry('history-1')).rejects.toThrow(
      new ValidationError({ path: 'classHistoryUuid', reason: 'field required (key "classHistoryUuid")' })
    );
    expect(transport.requestsTo('/v1/performance/summary')[0]?.query.get('maxDataPoints')).toBe('120');
  });
});

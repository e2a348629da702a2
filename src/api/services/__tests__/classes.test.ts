import { HttpError, StateError } from '@/lib/errors';
import { ClassType } from '@/src/api/schemas';
import type { ClassFilters } from '@/src/api/services';
import { jsonResponse } from '@/test-utils/fakeTransport';
import {
  bookingJson,
  classJson,
  MEMBER_UUID,
  OTHER_STUDIO_UUID,
  studioJson,
} from '@/test-utils/fixtures';
import { createTestApi } from '@/test-utils/session';

const BOOKINGS_PATH = `/member/members/${MEMBER_UUID}/bookings`;
const BOOK_PATH = '/commerce/v1/bookings/me';

// Monday 2024-01-01 through Wednesday 2024-01-03, deliberately out of order
const schedule = () => [
  classJson({ classUUId: 'class-0001', startDateTime: '2024-01-02T10:00:00', endDateTime: '2024-01-02T11:00:00' }),
  classJson({
    classUUId: 'class-0003',
    isCancelled: true,
    startDateTime: '2024-01-01T12:00:00',
    endDateTime: '2024-01-01T13:00:00',
  }),
  classJson({
    classUUId: 'class-0004',
    name: 'Strength 50',
    startDateTime: '2024-01-03T10:00:00',
    endDateTime: '2024-01-03T10:50:00',
  }),
  classJson({
    classUUId: 'class-0002',
    name: 'Tread 50',
    startDateTime: '2024-01-01T09:00:00',
    endDateTime: '2024-01-01T09:50:00',
    studio: studioJson({ studioUUId: OTHER_STUDIO_UUID, studioName: 'Shelbyville' }),
  }),
];

const bookingsFor = (...entries: Array<[string, string]>) =>
  entries.map(([classUuid, status], index) =>
    bookingJson({
      classBookingUUId: `booking-${index}`,
      status,
      class: classJson({ classUUId: classUuid }),
    })
  );

async function apiWithSchedule(bookings = bookingsFor(['class-0001', 'Booked'], ['class-0004', 'Cancelled'])) {
  const { api, transport } = await createTestApi();
  transport
    .on('GET', '/v1/classes', jsonResponse(200, { items: schedule() }))
    .on('GET', BOOKINGS_PATH, jsonResponse(200, { data: bookings }));
  return { api, transport };
}

describe('classesApi', () => {
  describe('getClasses', () => {
    test('queries the home studio on the io host', async () => {
      const { api, transport } = await apiWithSchedule();

      await api.classes.getClasses();

      const [request] = transport.requestsTo('/v1/classes');
      expect(request?.host).toBe('api.orangetheory.io');
      expect(request?.query.toString()).toBe('studio_ids=studio-home');
      expect(transport.requestsTo(BOOKINGS_PATH)[0]?.query.toString()).toBe('includeCanceled=false&expand=false');
    });

    test('repeats studio_ids for each requested studio', async () => {
      const { api, transport } = await apiWithSchedule();

      await api.classes.getClasses({ studioUuids: ['studio-a', 'studio-b'] });

      expect(transport.requestsTo('/v1/classes')[0]?.query.getAll('studio_ids')).toEqual(['studio-a', 'studio-b']);
    });

    test('drops cancelled classes, sorts by start and marks home studio and bookings', async () => {
      const { api } = await apiWithSchedule();

      const classes = await api.classes.getClasses();

      expect(classes.items.map((cls) => [cls.classUuid, cls.isHomeStudio, cls.isBooked])).toEqual([
        ['class-0002', false, false],
        ['class-0001', true, true],
        ['class-0004', true, false],
      ]);
    });

    test('keeps cancelled classes when asked', async () => {
      const { api } = await apiWithSchedule();

      const classes = await api.classes.getClasses({ includeCancelled: true });

      expect(classes.items.map((cls) => cls.classUuid)).toEqual(['class-0002', 'class-0003', 'class-0001', 'class-0004']);
    });

    test.each<[ClassFilters, string[]]>([
      [{ classTypes: [ClassType.members.Tread50] }, ['class-0002']],
      [{ daysOfWeek: ['tuesday'] }, ['class-0001']],
      [{ startDate: new Date('2024-01-02T00:00:00Z') }, ['class-0001', 'class-0004']],
      [{ endDate: new Date('2024-01-02T10:00:00Z') }, ['class-0002', 'class-0001']],
      [{ limit: 1 }, ['class-0002']],
    ])('filters with %p', async (filters, expected) => {
      const { api } = await apiWithSchedule();

      const classes = await api.classes.getClasses(filters);

      expect(classes.items.map((cls) => cls.classUuid)).toEqual(expected);
    });

    test('renders the default class table', async () => {
      const { api } = await apiWithSchedule();

      const table = (await api.classes.getClasses({ limit: 1 })).toTable();

      expect(table).toEqual({
        headers: ['Class DoW', 'Class Date', 'Class Time', 'Class Duration', 'Class Name', 'Studio Name', 'Home Studio', 'Booked'],
        rows: [['Monday', '2024-01-01', '9:00 AM', '50 min', 'Tread 50', 'Shelbyville', 'false', 'false']],
      });
    });
  });

  describe('bookClass', () => {
    test('refuses a class the member already holds', async () => {
      const { api, transport } = await apiWithSchedule();

      await expect(api.classes.bookClass('class-0001')).rejects.toThrow(
        new StateError('Class class-0001 is already booked (booking booking-0)')
      );
      expect(transport.requestsTo(BOOK_PATH)).toHaveLength(0);
    });

    test('books the class and returns the new booking', async () => {
      const { api, transport } = await createTestApi();
      transport
        .on('POST', BOOK_PATH, jsonResponse(200, { data: { classBookingUUId: 'booking-new' } }))
        .on('GET', BOOKINGS_PATH, () =>
          jsonResponse(200, {
            data: transport.requestsTo(BOOK_PATH).length > 0 ? bookingsFor(['class-0009', 'Booked']) : [],
          })
        );

      const booking = await api.classes.bookClass('class-0009');

      const [post] = transport.requestsTo(BOOK_PATH);
      expect(post?.host).toBe('api.orangetheory.io');
      expect(post?.body).toEqual({ classUUId: 'class-0009', confirmed: false, waitlist: false });
      expect(post?.headers['Content-Type']).toBe('application/json');
      expect(booking.otfClass.classUuid).toBe('class-0009');
      expect(booking.isHomeStudio).toBe(true);
    });

    test('fails when the accepted booking cannot be found', async () => {
      const { api, transport } = await createTestApi();
      transport
        .on('POST', BOOK_PATH, jsonResponse(200, {}))
        .on('GET', BOOKINGS_PATH, jsonResponse(200, { data: [] }));

      await expect(api.classes.bookClass('class-0009')).rejects.toThrow(
        'Booking for class class-0009 was accepted but not found'
      );
    });

    test('propagates a rejected booking', async () => {
      const { api, transport } = await createTestApi();
      transport
        .on('POST', BOOK_PATH, jsonResponse(409, { message: 'class is full' }))
        .on('GET', BOOKINGS_PATH, jsonResponse(200, { data: [] }));

      const failure = api.classes.bookClass('class-0009');

      await expect(failure).rejects.toBeInstanceOf(HttpError);
      await expect(failure).rejects.toMatchObject({ status: 409, body: '{"message":"class is full"}' });
    });
  });

  describe('cancelBooking', () => {
    test('confirms the cancellation on the default host', async () => {
      const { api, transport } = await createTestApi();
      transport.on('PUT', `${BOOKINGS_PATH}/booking-0001`, jsonResponse(200, {}));

      await expect(api.classes.cancelBooking('booking-0001')).resolves.toBeUndefined();

      const [put] = transport.requestsTo(`${BOOKINGS_PATH}/booking-0001`);
      expect(put?.url).toBe(`https://api.orangetheory.co${BOOKINGS_PATH}/booking-0001?confirmed=true`);
      expect(put?.body).toBeUndefined();
    });
  });
});

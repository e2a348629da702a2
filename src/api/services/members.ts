/**
 * Members API Service
 *
 * Member record, bookings and class totals for the signed-in member.
 * All endpoints are on the default host.
 */

import { unwrap, unwrapArray } from '../../../lib/typesafe';
import {
  ACTIVE_BOOKING_STATUSES,
  Booking,
  BookingList,
  MemberDetail,
  TotalClasses,
  type BookingStatus,
} from '../schemas';
import { segment, toDateParam, type ApiSession } from '../session';

export const DEFAULT_MEMBER_INCLUDES = ['memberAddresses', 'memberClassSummary'] as const;

export type BookingFilters = {
  startDate?: Date | null;
  endDate?: Date | null;
  /** Sent comma-separated; omitted means every status. */
  statuses?: readonly BookingStatus[];
  includeCancelled?: boolean;
  expand?: boolean;
};

export function createMembersApi(session: ApiSession) {
  const memberPath = () => `/member/members/${segment(session.user.memberUuid)}`;

  const withHomeStudio = (booking: Booking): Booking =>
    Booking.enrich(booking, {
      isHomeStudio: booking.otfClass.studio.studioUuid === session.homeStudioUuid,
    });

  const membersApi = {
    /**
     * Member record, with the related resources named in `include`
     */
    getMemberDetail: async (include: readonly string[] = DEFAULT_MEMBER_INCLUDES): Promise<MemberDetail> => {
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: memberPath(),
        params: { include: include.length > 0 ? include.join(',') : null },
      });
      return MemberDetail.parse(unwrap(payload, ['data']));
    },

    /**
     * Bookings in a date range, each marked with whether it is at the home studio
     */
    getBookings: async (filters: BookingFilters = {}): Promise<BookingList> => {
      const statuses = filters.statuses && filters.statuses.length > 0 ? filters.statuses.join(',') : null;
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: `${memberPath()}/bookings`,
        params: {
          startDate: toDateParam(filters.startDate),
          endDate: toDateParam(filters.endDate),
          statuses,
          includeCanceled: filters.includeCancelled ?? true,
          expand: filters.expand ?? false,
        },
      });
      const bookings = BookingList.parse(unwrapArray(payload, ['data']));
      return bookings.withItems(bookings.items.map(withHomeStudio));
    },

    getBooking: async (bookingUuid: string): Promise<Booking> => {
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: `${memberPath()}/bookings/${segment(bookingUuid)}`,
      });
      return withHomeStudio(Booking.parse(unwrap(payload, ['data'])));
    },

    /**
     * The member's active booking for a class, or null when there is none
     */
    getBookingByClassUuid: async (classUuid: string, filters: BookingFilters = {}): Promise<Booking | null> => {
      const bookings = await membersApi.getBookings({ ...filters, includeCancelled: false });
      const match = bookings.items.find(
        (booking) => booking.otfClass.classUuid === classUuid && ACTIVE_BOOKING_STATUSES.includes(booking.status)
      );
      return match ?? null;
    },

    getTotalClasses: async (): Promise<TotalClasses> => {
      const payload = await session.request({
        method: 'GET',
        host: 'default',
        path: '/mobile/v1/members/classes/summary',
      });
      return TotalClasses.parse(unwrap(payload, ['data']));
    },
  };

  return membersApi;
}

export type MembersApi = ReturnType<typeof createMembersApi>;

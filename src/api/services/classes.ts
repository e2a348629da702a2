/**
 * Classes API Service
 *
 * Class schedule lookups on the io host, plus booking and cancelling.
 */

import { compareAsc, isAfter, isBefore } from 'date-fns';

import { StateError } from '../../../lib/errors';
import { unwrapArray } from '../../../lib/typesafe';
import { ACTIVE_BOOKING_STATUSES, OtfClass, OtfClassList, type Booking, type ClassType } from '../schemas';
import { segment, type ApiSession } from '../session';
import type { MembersApi } from './members';

export type ClassFilters = {
  /** Defaults to the home studio. */
  studioUuids?: readonly string[];
  startDate?: Date;
  endDate?: Date;
  classTypes?: readonly ClassType[];
  /** Full weekday names, e.g. `Monday`. */
  daysOfWeek?: readonly string[];
  includeCancelled?: boolean;
  limit?: number;
};

function matches(cls: OtfClass, filters: ClassFilters): boolean {
  if (!filters.includeCancelled && cls.isCancelled) return false;
  if (filters.startDate && isBefore(cls.startsAt, filters.startDate)) return false;
  if (filters.endDate && isAfter(cls.startsAt, filters.endDate)) return false;
  if (filters.classTypes && filters.classTypes.length > 0 && !filters.classTypes.includes(cls.classType)) {
    return false;
  }
  if (filters.daysOfWeek && filters.daysOfWeek.length > 0) {
    const wanted = filters.daysOfWeek.map((day) => day.toLowerCase());
    if (!wanted.includes(cls.dayOfWeek.toLowerCase())) return false;
  }
  return true;
}

export function createClassesApi(session: ApiSession, members: MembersApi) {
  const classesApi = {
    /**
     * Scheduled classes at the given studios, filtered and sorted by start
     * time. Each class is marked with whether it is at the home studio and
     * whether the member already holds a booking for it.
     */
    getClasses: async (filters: ClassFilters = {}): Promise<OtfClassList> => {
      const studioUuids =
        filters.studioUuids && filters.studioUuids.length > 0 ? filters.studioUuids : [session.homeStudioUuid];

      const payload = await session.request({
        method: 'GET',
        host: 'io',
        path: '/v1/classes',
        params: { studio_ids: studioUuids },
      });
      const classes = OtfClassList.parse(unwrapArray(payload, ['items']));

      const selected = classes.items
        .filter((cls) => matches(cls, filters))
        .sort((a, b) => compareAsc(a.startsAt, b.startsAt))
        .slice(0, filters.limit);

      const bookings = await members.getBookings({
        startDate: filters.startDate,
        endDate: filters.endDate,
        includeCancelled: false,
      });
      const booked = new Set(
        bookings.items
          .filter((booking) => ACTIVE_BOOKING_STATUSES.includes(booking.status))
          .map((booking) => booking.otfClass.classUuid)
      );

      const enriched = selected.map((cls) =>
        OtfClass.enrich(cls, {
          isHomeStudio: cls.studio.studioUuid === session.homeStudioUuid,
          isBooked: booked.has(cls.classUuid),
        })
      );
      return classes.withItems(enriched);
    },

    /**
     * Book a class for the member and return the resulting booking.
     *
     * @throws StateError when the member already holds a booking for the class
     */
    bookClass: async (classUuid: string): Promise<Booking> => {
      const existing = await members.getBookingByClassUuid(classUuid);
      if (existing) {
        throw new StateError(`Class ${classUuid} is already booked (booking ${existing.classBookingUuid})`);
      }

      await session.request({
        method: 'POST',
        host: 'io',
        path: '/commerce/v1/bookings/me',
        body: { classUUId: classUuid, confirmed: false, waitlist: false },
      });

      const booking = await members.getBookingByClassUuid(classUuid);
      if (!booking) {
        throw new StateError(`Booking for class ${classUuid} was accepted but not found`);
      }
      return booking;
    },

    cancelBooking: async (bookingUuid: string): Promise<void> => {
      await session.request({
        method: 'PUT',
        host: 'default',
        path: `/member/members/${segment(session.user.memberUuid)}/bookings/${segment(bookingUuid)}`,
        params: { confirmed: true },
      });
    },
  };

  return classesApi;
}

export type ClassesApi = ReturnType<typeof createClassesApi>;

import { defineCollection, defineEnum, defineModel, field, type Collection, type Entity, type EnumValue } from '../../../lib/models';
import { CLASS_HEADERS, OtfClass } from './classes';

export const BookingStatus = defineEnum('BookingStatus', {
  CheckedIn: 'Checked In',
  CancelCheckinPending: 'Cancel Checkin Pending',
  CancelCheckinRequested: 'Cancel Checkin Requested',
  Cancelled: 'Cancelled',
  LateCancelled: 'Late Cancelled',
  Booked: 'Booked',
  Waitlisted: 'Waitlisted',
  CheckinPending: 'Checkin Pending',
  CheckinRequested: 'Checkin Requested',
  CheckinCancelled: 'Checkin Cancelled',
});
export type BookingStatus = EnumValue<typeof BookingStatus>;

/** Statuses that still hold a spot in the class. */
export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.members.Booked,
  BookingStatus.members.Waitlisted,
  BookingStatus.members.CheckedIn,
  BookingStatus.members.CheckinPending,
  BookingStatus.members.CheckinRequested,
];

export const BookingMember = defineModel('BookingMember', {
  memberUuid: field.string().from('memberUUId'),
  firstName: field.string(),
  lastName: field.string(),
  email: field.string(),
  phoneNumber: field.string().optional(),
  gender: field.string().optional(),
  ccLast4: field.string().from('ccLast4').optional().exclude(),
});

export const Booking = defineModel(
  'Booking',
  {
    classBookingId: field.integer(),
    classBookingUuid: field.string().from('classBookingUUId'),
    studioId: field.integer(),
    classId: field.integer(),
    isIntro: field.boolean(),
    memberId: field.integer(),
    mboMemberId: field.string().optional().exclude(),
    mboClassId: field.integer().optional().exclude(),
    mboVisitId: field.integer().optional().exclude(),
    mboWaitlistEntryId: field.integer().optional().exclude(),
    mboSyncMessage: field.string().optional().exclude(),
    status: field.enum(BookingStatus),
    bookedDate: field.datetime().optional(),
    checkedInDate: field.datetime().optional(),
    cancelledDate: field.datetime().optional(),
    createdBy: field.string().optional().exclude(),
    createdDate: field.datetime(),
    updatedBy: field.string().optional().exclude(),
    updatedDate: field.datetime(),
    isDeleted: field.boolean(),
    member: field.model(BookingMember).optional().exclude(),
    waitlistPosition: field.integer().optional(),
    otfClass: field.model(OtfClass).from('class'),
    isHomeStudio: field.derived<boolean>(),
  },
  {
    headers: {
      classBookingUuid: 'Booking UUID',
      isHomeStudio: CLASS_HEADERS.isHomeStudio,
    },
  }
);
export type Booking = Entity<typeof Booking>;

export const BookingList = defineCollection('bookings', Booking, {
  defaultColumns: [
    'otfClass.dayOfWeek',
    'otfClass.date',
    'otfClass.time',
    'otfClass.duration',
    'otfClass.name',
    'status',
    'otfClass.studio.name',
    'isHomeStudio',
  ],
});
export type BookingList = Collection<typeof BookingList>;

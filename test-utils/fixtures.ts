/**
 * Raw API payloads as the service sends them, with overridable fields.
 */

export const MEMBER_UUID = 'member-0001';
export const MEMBER_EMAIL = 'member@example.test';
export const HOME_STUDIO_UUID = 'studio-home';
export const OTHER_STUDIO_UUID = 'studio-away';

type Json = Record<string, unknown>;

function base64url(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

/** Unsigned JWT carrying the identity claims the client reads. */
export function idTokenFor(memberUuid: string = MEMBER_UUID, email: string = MEMBER_EMAIL): string {
  return `${base64url({ alg: 'none' })}.${base64url({ 'cognito:username': memberUuid, email })}.test-signature`;
}

export function studioLocationJson(overrides: Json = {}): Json {
  return {
    latitude: 40.7,
    longitude: -74.0,
    phoneNumber: '555-0100',
    physicalCity: 'Springfield',
    physicalAddress: '1 Main St',
    physicalAddress2: null,
    physicalState: 'NY',
    physicalPostalCode: '10001',
    physicalRegion: 'East',
    physicalCountryId: 1,
    physicalCountry: 'United States',
    ...overrides,
  };
}

export function studioJson(overrides: Json = {}): Json {
  return {
    studioUUId: HOME_STUDIO_UUID,
    studioName: 'Springfield Central',
    description: null,
    contactEmail: 'studio@example.test',
    status: 'Active',
    logoUrl: null,
    timeZone: 'America/New_York',
    mboStudioId: 77,
    studioId: 12,
    allowsCRWaitlist: true,
    crWaitlistFlagLastUpdated: '2023-06-01T00:00:00',
    studioLocation: studioLocationJson(),
    ...overrides,
  };
}

export function studioDetailJson(overrides: Json = {}): Json {
  return {
    studioUUId: HOME_STUDIO_UUID,
    studioName: 'Springfield Central',
    studioNumber: '0012',
    studioStatus: 'Active',
    timeZone: 'America/New_York',
    contactEmail: 'studio@example.test',
    acceptsVisaMasterCard: true,
    acceptsAmericanExpress: false,
    distance: 1.5,
    studioLocation: studioLocationJson(),
    studioId: 12,
    mboStudioId: 77,
    ...overrides,
  };
}

export function classJson(overrides: Json = {}): Json {
  return {
    classUUId: 'class-0001',
    name: 'Orange 60',
    description: 'Full body interval class',
    startDateTime: '2024-01-01T10:00:00',
    endDateTime: '2024-01-01T11:00:00',
    isAvailable: true,
    isCancelled: false,
    programName: 'Orange 60',
    coachId: 5,
    studio: studioJson(),
    coach: {
      coachUUId: 'coach-0001',
      name: 'Sam',
      firstName: 'Sam',
      lastName: 'Rivera',
      imageUrl: 'https://images.example.test/sam.png',
    },
    location: {
      address1: '1 Main St',
      address2: null,
      city: 'Springfield',
      latitude: 40.7,
      longitude: -74.0,
      phone: '555-0100',
      postalCode: '10001',
      state: 'NY',
    },
    virtualClass: false,
    ...overrides,
  };
}

export function bookingJson(overrides: Json = {}): Json {
  return {
    classBookingId: 9001,
    classBookingUUId: 'booking-0001',
    studioId: 12,
    classId: 3001,
    isIntro: false,
    memberId: 42,
    mboMemberId: 'mbo-42',
    mboClassId: 555,
    mboVisitId: null,
    mboWaitlistEntryId: null,
    mboSyncMessage: null,
    status: 'Booked',
    bookedDate: '2023-12-28T09:00:00',
    checkedInDate: null,
    cancelledDate: null,
    createdBy: 'system',
    createdDate: '2023-12-28T09:00:00',
    updatedBy: 'system',
    updatedDate: '2023-12-28T09:00:00',
    isDeleted: false,
    member: {
      memberUUId: MEMBER_UUID,
      firstName: 'Alex',
      lastName: 'Kim',
      email: MEMBER_EMAIL,
      phoneNumber: '555-0199',
      gender: 'X',
      ccLast4: '0000',
    },
    waitlistPosition: null,
    class: classJson(),
    ...overrides,
  };
}

export function memberDetailJson(overrides: Json = {}): Json {
  return {
    memberId: 42,
    memberUUId: MEMBER_UUID,
    cognitoId: 'cognito-42',
    homeStudioId: 12,
    firstName: 'Alex',
    lastName: 'Kim',
    email: MEMBER_EMAIL,
    phoneNumber: '555-0199',
    birthDay: '1990-05-04',
    createdDate: '2020-01-01T00:00:00',
    homeStudio: {
      studioId: 12,
      studioUUId: HOME_STUDIO_UUID,
      studioName: 'Springfield Central',
      timeZone: 'America/New_York',
      mboStudioId: 77,
    },
    addresses: [],
    memberClassSummary: {
      totalClassesBooked: 10,
      totalClassesAttended: 8,
    },
    ...overrides,
  };
}

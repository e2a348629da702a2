import { defineModel, field, type Entity } from '../../../lib/models';

export const MemberAddress = defineModel('MemberAddress', {
  type: field.string().optional(),
  address1: field.string().optional(),
  address2: field.string().optional(),
  suburb: field.string().optional(),
  territory: field.string().optional(),
  postalCode: field.string().optional(),
  country: field.string().optional(),
});

export const MemberClassSummary = defineModel('MemberClassSummary', {
  totalClassesBooked: field.integer().optional(0),
  totalClassesAttended: field.integer().optional(0),
  totalIntro: field.integer().optional(0),
  totalOtLiveClassesBooked: field.integer().from('totalOTLiveClassesBooked').optional(0),
  totalOtLiveClassesAttended: field.integer().from('totalOTLiveClassesAttended').optional(0),
  totalClassesUsedHrm: field.integer().from('totalClassesUsedHRM').optional(0),
  totalStudiosVisited: field.integer().optional(0),
  firstVisitDate: field.datetime().optional(),
  lastClassVisitedDate: field.datetime().optional(),
  lastClassBookedDate: field.datetime().optional(),
});

/** Home studio as embedded in the member record. */
export const MemberHomeStudio = defineModel('MemberHomeStudio', {
  studioId: field.integer(),
  studioUuid: field.string().from('studioUUId'),
  name: field.string().from('studioName'),
  timeZone: field.string().optional(),
  mboStudioId: field.integer().optional().exclude(),
});

export const MemberDetail = defineModel(
  'MemberDetail',
  {
    memberId: field.integer(),
    memberUuid: field.string().from('memberUUId'),
    cognitoId: field.string().optional().exclude(),
    homeStudioId: field.integer(),
    firstName: field.string(),
    lastName: field.string(),
    email: field.string(),
    phoneNumber: field.string().optional(),
    gender: field.string().optional(),
    birthDay: field.datetime().optional(),
    locale: field.string().optional(),
    createdDate: field.datetime().optional(),
    mboId: field.string().optional().exclude(),
    ccLast4: field.string().optional().exclude(),
    homeStudio: field.model(MemberHomeStudio),
    addresses: field.list(field.model(MemberAddress)).from('addresses').optional([]),
    classSummary: field.model(MemberClassSummary).from('memberClassSummary').optional(),
  },
  { headers: { memberUuid: 'Member UUID' } }
);
export type MemberDetail = Entity<typeof MemberDetail>;

export const TotalClasses = defineModel('TotalClasses', {
  totalInStudioClassesAttended: field.integer(),
  totalOtLiveClassesAttended: field.integer().from('totalOtliveClassesAttended'),
});
export type TotalClasses = Entity<typeof TotalClasses>;

import {
  formatClassDate,
  formatClassDayOfWeek,
  formatClassDuration,
  formatClassTime,
} from '../../../lib/timezone/formatClassTime';
import { defineCollection, defineEnum, defineModel, field, type Collection, type Entity, type EnumValue } from '../../../lib/models';
import { Studio } from './studios';

export const ClassType = defineEnum('ClassType', {
  Orange60: 'Orange 60',
  Orange90: 'Orange 90',
  Strength50: 'Strength 50',
  Tread50: 'Tread 50',
  Other: 'Other',
});
export type ClassType = EnumValue<typeof ClassType>;

const PROGRAM_TYPES: ReadonlyArray<[RegExp, ClassType]> = [
  [/strength/i, ClassType.members.Strength50],
  [/tread/i, ClassType.members.Tread50],
  [/90/, ClassType.members.Orange90],
  [/orange|60|otf/i, ClassType.members.Orange60],
];

/** Best-effort class type from a free-text class or program name. */
export function classTypeOf(name: string): ClassType {
  const exact = ClassType.fromValue(name);
  if (exact !== undefined) return exact;
  const match = PROGRAM_TYPES.find(([pattern]) => pattern.test(name));
  return match ? match[1] : ClassType.members.Other;
}

export const Coach = defineModel('Coach', {
  coachUuid: field.string().from('coachUUId'),
  name: field.string(),
  firstName: field.string(),
  lastName: field.string(),
  imageUrl: field.string().optional().exclude(),
  profilePictureUrl: field.string().optional().exclude(),
});
export type Coach = Entity<typeof Coach>;

export const Location = defineModel('Location', {
  addressOne: field.string().from('address1'),
  addressTwo: field.string().from('address2').optional(),
  city: field.string(),
  country: field.string().optional(),
  distance: field.number().optional(),
  latitude: field.number(),
  longitude: field.number(),
  locationName: field.string().optional(),
  phoneNumber: field.string().from('phone'),
  postalCode: field.string().optional(),
  state: field.string().optional(),
});
export type Location = Entity<typeof Location>;

export const CLASS_HEADERS = {
  dayOfWeek: 'Class DoW',
  date: 'Class Date',
  time: 'Class Time',
  duration: 'Class Duration',
  name: 'Class Name',
  isHomeStudio: 'Home Studio',
  isBooked: 'Booked',
} as const;

export const OtfClass = defineModel(
  'OtfClass',
  {
    classUuid: field.string().from('classUUId'),
    name: field.string(),
    description: field.string().optional().exclude(),
    startsAt: field.datetime().from('startDateTime'),
    endsAt: field.datetime().from('endDateTime'),
    isAvailable: field.boolean(),
    isCancelled: field.boolean(),
    programName: field.string(),
    coachId: field.integer(),
    studio: field.model(Studio),
    coach: field.model(Coach),
    location: field.model(Location),
    virtualClass: field.boolean().optional(),
    isHomeStudio: field.derived<boolean>(),
    isBooked: field.derived<boolean>(),
  },
  {
    headers: CLASS_HEADERS,
    computed: {
      dayOfWeek: (cls) => formatClassDayOfWeek(cls.startsAt),
      date: (cls) => formatClassDate(cls.startsAt),
      time: (cls) => formatClassTime(cls.startsAt),
      duration: (cls) => formatClassDuration(cls.startsAt, cls.endsAt),
      classType: (cls) => classTypeOf(cls.name),
    },
  }
);
export type OtfClass = Entity<typeof OtfClass>;

export const OtfClassList = defineCollection('classes', OtfClass, {
  defaultColumns: ['dayOfWeek', 'date', 'time', 'duration', 'name', 'studio.name', 'isHomeStudio', 'isBooked'],
});
export type OtfClassList = Collection<typeof OtfClassList>;

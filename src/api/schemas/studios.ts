import { defineCollection, defineEnum, defineModel, field, type Collection, type Entity, type EnumValue } from '../../../lib/models';

export const StudioStatus = defineEnum('StudioStatus', {
  Other: 'OTHER',
  Active: 'Active',
  Inactive: 'Inactive',
  ComingSoon: 'Coming Soon',
  TemporarilyClosed: 'Temporarily Closed',
  PermanentlyClosed: 'Permanently Closed',
});
export type StudioStatus = EnumValue<typeof StudioStatus>;

export const Currency = defineModel('Currency', {
  alphabeticCode: field.string().from('currencyAlphabeticCode'),
});

export const DefaultCurrency = defineModel('DefaultCurrency', {
  currencyId: field.integer(),
  currency: field.model(Currency),
});

export const StudioLocationCountry = defineModel('StudioLocationCountry', {
  currencyCode: field.string().from('countryCurrencyCode'),
  defaultCurrency: field.model(DefaultCurrency).from('defaultCurrency'),
});

export const StudioLocation = defineModel('StudioLocation', {
  latitude: field.number(),
  longitude: field.number(),
  phoneNumber: field.string(),
  city: field.string().from('physicalCity'),
  address: field.string().from('physicalAddress'),
  address2: field.string().from('physicalAddress2').optional(),
  state: field.string().from('physicalState'),
  postalCode: field.string().from('physicalPostalCode'),
  region: field.string().from('physicalRegion').optional().exclude(),
  countryId: field.integer().from('physicalCountryId').optional().exclude(),
  country: field.string().from('physicalCountry'),
  countryDetails: field.model(StudioLocationCountry).from('country').optional().exclude(),
});
export type StudioLocation = Entity<typeof StudioLocation>;

/** Studio as embedded in classes and bookings. */
export const Studio = defineModel(
  'Studio',
  {
    studioUuid: field.string().from('studioUUId'),
    name: field.string().from('studioName'),
    description: field.string().optional(),
    contactEmail: field.string().optional().exclude(),
    status: field.enum(StudioStatus),
    logoUrl: field.string().optional().exclude(),
    timeZone: field.string(),
    mboStudioId: field.integer().optional().exclude(),
    studioId: field.integer(),
    allowsCrWaitlist: field.boolean().from('allowsCRWaitlist').optional(),
    crWaitlistFlagLastUpdated: field.datetime().optional().exclude(),
    location: field.model(StudioLocation).from('studioLocation').optional().exclude(),
  },
  { headers: { studioUuid: 'Studio UUID' } }
);
export type Studio = Entity<typeof Studio>;

export const StudioDetail = defineModel(
  'StudioDetail',
  {
    studioUuid: field.string().from('studioUUId'),
    name: field.string().from('studioName'),
    studioNumber: field.string().optional(),
    status: field.enum(StudioStatus).from('studioStatus'),
    timeZone: field.string().optional(),
    description: field.string().optional(),
    contactEmail: field.string().optional(),
    acceptsVisaMasterCard: field.boolean().optional().exclude(),
    acceptsAmex: field.boolean().from('acceptsAmericanExpress').optional().exclude(),
    distance: field.number().optional(),
    location: field.model(StudioLocation).from('studioLocation'),
    studioId: field.integer().optional().exclude(),
    mboStudioId: field.integer().optional().exclude(),
  },
  {
    headers: {
      studioUuid: 'Studio UUID',
      'location.address': 'Address',
      'location.city': 'City',
    },
  }
);
export type StudioDetail = Entity<typeof StudioDetail>;

export const StudioDetailList = defineCollection('studios', StudioDetail, {
  defaultColumns: ['name', 'location.address', 'location.city', 'location.state', 'distance', 'status'],
});
export type StudioDetailList = Collection<typeof StudioDetailList>;

export const StudioService = defineModel('StudioService', {
  serviceUuid: field.string().from('serviceUUId'),
  name: field.string(),
  price: field.string(),
  qty: field.integer(),
  onlinePrice: field.string().optional(),
  taxRate: field.string().optional(),
  current: field.boolean().optional(false),
  isDeleted: field.boolean().optional(false).exclude(),
  createdDate: field.datetime().optional().exclude(),
  updatedDate: field.datetime().optional().exclude(),
});
export type StudioService = Entity<typeof StudioService>;

export const StudioServiceList = defineCollection('services', StudioService, {
  defaultColumns: ['name', 'price', 'qty', 'current'],
});
export type StudioServiceList = Collection<typeof StudioServiceList>;

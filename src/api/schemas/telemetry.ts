import { defineCollection, defineModel, field, type Collection, type Entity } from '../../../lib/models';

export const MaxHr = defineModel('MaxHr', {
  type: field.string(),
  value: field.integer(),
});

export const TelemetryMaxHr = defineModel('TelemetryMaxHr', {
  memberUuid: field.string(),
  maxHr: field.model(MaxHr),
});
export type TelemetryMaxHr = Entity<typeof TelemetryMaxHr>;

export const HrHistoryEntry = defineModel(
  'HrHistoryEntry',
  {
    maxHrType: field.string(),
    maxHrValue: field.integer(),
    changeFrom: field.string().optional(),
    changeSource: field.string().optional(),
    assignedAt: field.datetime(),
  },
  { headers: { maxHrType: 'Max HR Type', maxHrValue: 'Max HR' } }
);
export type HrHistoryEntry = Entity<typeof HrHistoryEntry>;

export const HrHistoryList = defineCollection('history', HrHistoryEntry, {
  defaultColumns: ['assignedAt', 'maxHrType', 'maxHrValue', 'changeSource'],
});
export type HrHistoryList = Collection<typeof HrHistoryList>;

export const Zone = defineModel('Zone', {
  startBpm: field.integer(),
  endBpm: field.integer(),
});

export const Zones = defineModel('Zones', {
  gray: field.model(Zone),
  blue: field.model(Zone),
  green: field.model(Zone),
  orange: field.model(Zone),
  red: field.model(Zone),
});

export const TelemetrySample = defineModel('TelemetrySample', {
  relativeTimestamp: field.integer(),
  hr: field.integer().optional(),
  aggSplats: field.integer().optional(),
  aggCalories: field.integer().optional(),
  timestamp: field.datetime().optional(),
  treadData: field.json().optional().exclude(),
  rowData: field.json().optional().exclude(),
});
export type TelemetrySample = Entity<typeof TelemetrySample>;

export const Telemetry = defineModel('Telemetry', {
  memberUuid: field.string(),
  classHistoryUuid: field.string(),
  classStartTime: field.datetime().optional(),
  maxHr: field.integer().optional(),
  zones: field.model(Zones).optional(),
  windowSize: field.integer().optional(),
  telemetry: field.list(field.model(TelemetrySample)).optional([]),
});
export type Telemetry = Entity<typeof Telemetry>;

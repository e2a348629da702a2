import { defineCollection, defineModel, field, type Collection, type Entity } from '../../../lib/models';

export const ZoneTimeMinutes = defineModel('ZoneTimeMinutes', {
  gray: field.number().optional(0),
  blue: field.number().optional(0),
  green: field.number().optional(0),
  orange: field.number().optional(0),
  red: field.number().optional(0),
});

export const HeartRate = defineModel('HeartRate', {
  maxHr: field.integer().from('max_hr').optional(),
  peakHr: field.integer().from('peak_hr').optional(),
  peakHrPercent: field.integer().from('peak_hr_percent').optional(),
  avgHr: field.integer().from('avg_hr').optional(),
  avgHrPercent: field.integer().from('avg_hr_percent').optional(),
});

export const PerformanceDetails = defineModel('PerformanceDetails', {
  caloriesBurned: field.integer().from('calories_burned').optional(0),
  splatPoints: field.integer().from('splat_points').optional(0),
  stepCount: field.integer().from('step_count').optional(),
  activeTimeSeconds: field.integer().from('active_time_seconds').optional(),
  zoneTimeMinutes: field.model(ZoneTimeMinutes).from('zone_time_minutes').optional(),
  heartRate: field.model(HeartRate).from('heart_rate').optional(),
  equipmentData: field.json().from('equipment_data').optional().exclude(),
});

export const PerformanceClass = defineModel('PerformanceClass', {
  classUuid: field.string().from('ot_base_class_uuid').optional(),
  startsAt: field.datetime().from('starts_at_local'),
  name: field.string().optional(),
  type: field.string().optional(),
});

export const PerformanceCoach = defineModel('PerformanceCoach', {
  firstName: field.string().from('first_name'),
  imageUrl: field.string().from('image_url').optional().exclude(),
});

export const PerformanceStudio = defineModel('PerformanceStudio', {
  studioUuid: field.string().from('uuid').optional(),
  name: field.string(),
});

export const PerformanceSummaryEntry = defineModel(
  'PerformanceSummaryEntry',
  {
    id: field.string(),
    details: field.model(PerformanceDetails),
    ratable: field.boolean().optional(false),
    otfClass: field.model(PerformanceClass).from('class'),
    coach: field.model(PerformanceCoach).optional(),
    studio: field.model(PerformanceStudio).optional(),
  },
  { headers: { id: 'Summary ID', 'otfClass.startsAt': 'Class Date' } }
);
export type PerformanceSummaryEntry = Entity<typeof PerformanceSummaryEntry>;

export const PerformanceSummaryList = defineCollection('summaries', PerformanceSummaryEntry, {
  defaultColumns: [
    'otfClass.startsAt',
    'otfClass.name',
    'studio.name',
    'details.caloriesBurned',
    'details.splatPoints',
    'details.heartRate.avgHr',
  ],
});
export type PerformanceSummaryList = Collection<typeof PerformanceSummaryList>;

export const PerformanceSummaryDetail = defineModel('PerformanceSummaryDetail', {
  id: field.string(),
  classHistoryUuid: field.string().from('class_history_uuid').optional(),
  details: field.model(PerformanceDetails),
  otfClass: field.model(PerformanceClass).from('class').optional(),
  ratable: field.boolean().optional(false),
});
export type PerformanceSummaryDetail = Entity<typeof PerformanceSummaryDetail>;

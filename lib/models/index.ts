export { defineEnum, EnumTable, type EnumMembers, type EnumValue } from './enum';
export { field, parseDatetime, DerivedField, Field, type DatetimeOptions, type FieldKind } from './field';
export {
  defineModel,
  joinPath,
  Model,
  type ComputedMap,
  type ComputedValues,
  type DerivedPatch,
  type Entity,
  type EntityOf,
  type FieldMap,
  type ModelOptions,
  type ValuesOf,
} from './model';
export {
  defineCollection,
  resolvePath,
  CollectionModel,
  EntityCollection,
  type Collection,
  type CollectionMeta,
  type Table,
} from './collection';
export { columnHeader, humanize } from './headers';

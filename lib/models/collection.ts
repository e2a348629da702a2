/**
 * Named lists of one entity type, with a tabular projection.
 */

import { ValidationError } from '../errors';
import { isRecord } from '../typesafe';
import type { ModelShape } from './field';
import type { Model, ComputedValues, EntityOf, FieldMap } from './model';

export type Table = {
  headers: string[];
  rows: string[][];
};

export type CollectionMeta = Readonly<Record<string, unknown>>;

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(formatCell).join(', ');
  if (isRecord(value)) return JSON.stringify(value);
  return String(value);
}

/** Follow a dotted path through nested entities. A null link yields `undefined`. */
export function resolvePath(entity: unknown, path: string): unknown {
  let current: unknown = entity;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export class EntityCollection<F extends FieldMap, R extends ComputedValues> {
  constructor(
    readonly name: string,
    readonly items: ReadonlyArray<EntityOf<F, R>>,
    readonly meta: CollectionMeta,
    private readonly model: Model<F, R>,
    private readonly defaultColumns: readonly string[]
  ) {}

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<EntityOf<F, R>> {
    return this.items[Symbol.iterator]();
  }

  /** Same collection type over a subset, e.g. after client-side filtering. */
  withItems(items: ReadonlyArray<EntityOf<F, R>>): EntityCollection<F, R> {
    return new EntityCollection(this.name, items, this.meta, this.model, this.defaultColumns);
  }

  toDisplay(): Record<string, unknown> {
    return { [this.name]: this.items.map((item) => this.model.toDisplay(item)) };
  }

  /**
   * One row per entity in input order. Columns are dotted paths of internal
   * field names and may name computed or derived fields.
   */
  toTable(columns: readonly string[] = this.defaultColumns): Table {
    return {
      headers: columns.map((column) => this.model.header(column)),
      rows: this.items.map((item) => columns.map((column) => this.cell(item, column))),
    };
  }

  private cell(item: EntityOf<F, R>, column: string): string {
    const segments = column.split('.');
    const last = segments.pop() ?? column;
    let owner: ModelShape | undefined = this.model;
    for (const segment of segments) {
      owner = owner?.child(segment);
    }
    const value = resolvePath(item, column);
    return formatCell(owner ? owner.displayField(last, value) : value);
  }
}

export type CollectionOptions = {
  defaultColumns?: readonly string[];
};

function visibleFields(fields: FieldMap): string[] {
  return Object.entries(fields)
    .filter(([, definition]) => !definition.excluded)
    .map(([name]) => name);
}

export class CollectionModel<F extends FieldMap, R extends ComputedValues> {
  constructor(
    readonly name: string,
    readonly item: Model<F, R>,
    private readonly options: CollectionOptions = {}
  ) {}

  /**
   * @param raw - the JSON list of items
   * @param meta - anything the façade wants to keep alongside, e.g. paging info
   */
  parse(raw: unknown, meta: CollectionMeta = {}): EntityCollection<F, R> {
    if (!Array.isArray(raw)) {
      throw new ValidationError({ path: this.name, reason: 'expected a list', value: raw });
    }
    const items = raw.map((entry, index) => this.item.parseAt(entry, `${this.name}.${index}`));
    return this.from(items, meta);
  }

  from(items: ReadonlyArray<EntityOf<F, R>>, meta: CollectionMeta = {}): EntityCollection<F, R> {
    return new EntityCollection(
      this.name,
      Object.freeze([...items]),
      Object.freeze({ ...meta }),
      this.item,
      this.options.defaultColumns ?? visibleFields(this.item.fields)
    );
  }
}

export function defineCollection<F extends FieldMap, R extends ComputedValues>(
  name: string,
  item: Model<F, R>,
  options: CollectionOptions = {}
): CollectionModel<F, R> {
  return new CollectionModel(name, item, options);
}

export type Collection<L> = L extends CollectionModel<infer F, infer R> ? EntityCollection<F, R> : never;

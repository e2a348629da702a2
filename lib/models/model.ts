/**
 * Declarative models.
 *
 * A model is a named, ordered map of fields plus optional header overrides
 * and computed values. `parse` is the single interpreter: it walks the map,
 * reads each field from its alias, and returns a frozen entity. Failures
 * anywhere below surface as one `ValidationError` carrying the dotted
 * internal path of the offending field.
 */

import { ValidationError } from '../errors';
import { isRecord } from '../typesafe';
import { DerivedField, Field, type ModelShape, type NestedParser } from './field';
import { columnHeader } from './headers';

export type FieldMap = Readonly<Record<string, Field<unknown>>>;

export type ValuesOf<F extends FieldMap> = {
  readonly [K in keyof F]: F[K] extends Field<infer T> ? T : never;
};

/** Result types of a model's computed values, keyed by name. */
export type ComputedValues = Readonly<Record<string, unknown>>;

export type ComputedMap<F extends FieldMap, R extends ComputedValues> = {
  readonly [K in keyof R]: (entity: ValuesOf<F>) => R[K];
};

export type EntityOf<F extends FieldMap, R extends ComputedValues> = ValuesOf<F> & {
  readonly [K in keyof R]: R[K];
};

type DerivedKeys<F extends FieldMap> = {
  [K in keyof F]: F[K] extends DerivedField<unknown> ? K : never;
}[keyof F];

/** Values accepted by `Model.enrich`: derived fields only. */
export type DerivedPatch<F extends FieldMap> = Partial<Pick<ValuesOf<F>, DerivedKeys<F>>>;

export type ModelOptions<F extends FieldMap, R extends ComputedValues> = {
  /** Column headers keyed by field name or dotted path. */
  headers?: Readonly<Record<string, string>>;
  /** Values computed from parsed fields. They are not part of display output. */
  computed?: ComputedMap<F, R>;
};

export function joinPath(parent: string, child: string): string {
  return parent ? `${parent}.${child}` : child;
}

export class Model<F extends FieldMap, R extends ComputedValues = Record<never, never>>
  implements NestedParser<EntityOf<F, R>>
{
  constructor(
    readonly name: string,
    readonly fields: F,
    private readonly options: ModelOptions<F, R> = {}
  ) {}

  parse(raw: unknown): EntityOf<F, R> {
    return this.parseAt(raw, '');
  }

  parseAt(raw: unknown, path: string): EntityOf<F, R> {
    if (!isRecord(raw)) {
      throw new ValidationError({ path: path || '<root>', reason: `expected an object for ${this.name}`, value: raw });
    }

    const values: Record<string, unknown> = {};
    for (const [name, definition] of Object.entries(this.fields)) {
      values[name] = definition.read(raw, name, joinPath(path, name));
    }
    return this.seal(values);
  }

  /**
   * Return a copy of `entity` with derived fields filled in. This is the only
   * step allowed to change an entity after parsing.
   */
  enrich(entity: EntityOf<F, R>, patch: DerivedPatch<F>): EntityOf<F, R> {
    const values: Record<string, unknown> = Object.fromEntries(Object.entries(entity));
    for (const [name, value] of Object.entries(patch)) {
      const definition = this.fields[name];
      if (!definition?.derived) {
        throw new ValidationError({ path: name, reason: `${this.name}.${name} is not a derived field` });
      }
      values[name] = value;
    }
    return this.seal(values);
  }

  /** Display form of one field's value. Names that are not fields pass through. */
  displayField(fieldName: string, value: unknown): unknown {
    const definition = this.fields[fieldName];
    return definition ? definition.display(value) : value;
  }

  /** Plain object for display and debugging, without excluded fields. */
  toDisplay(entity: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, definition] of Object.entries(this.fields)) {
      if (definition.excluded) continue;
      out[name] = definition.display(entity[name]);
    }
    return out;
  }

  child(fieldName: string): ModelShape | undefined {
    return this.fields[fieldName]?.target;
  }

  headerOverride(fieldName: string): string | undefined {
    return this.options.headers?.[fieldName];
  }

  header(path: string): string {
    return columnHeader(this, path);
  }

  private seal(values: Record<string, unknown>): EntityOf<F, R> {
    // Every declared field has been read and decoded by its own codec
    const entity = values as unknown as EntityOf<F, R>;
    const computed: Readonly<Record<string, (parsed: ValuesOf<F>) => unknown>> | undefined = this.options.computed;
    if (computed) {
      for (const [name, compute] of Object.entries(computed)) {
        values[name] = compute(entity);
      }
    }
    Object.freeze(values);
    return entity;
  }
}

/**
 * Declare a model.
 *
 * @example
 * ```ts
 * const Studio = defineModel('Studio', {
 *   studioUuid: field.string().from('studioUUId'),
 *   name: field.string().from('studioName'),
 *   status: field.enum(StudioStatus),
 * });
 * type Studio = Entity<typeof Studio>;
 * ```
 */
export function defineModel<F extends FieldMap, R extends ComputedValues = Record<never, never>>(
  name: string,
  fields: F,
  options: ModelOptions<F, R> = {}
): Model<F, R> {
  return new Model(name, fields, options);
}

export type Entity<M> = M extends Model<infer F, infer R> ? EntityOf<F, R> : never;

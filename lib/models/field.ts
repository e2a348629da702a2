/**
 * Field declarations for the model layer.
 *
 * A field knows its external key (alias), whether it must be present, how to
 * decode a raw JSON value, and how to render the decoded value for display.
 * Models interpret an ordered map of these; nothing here uses reflection.
 */

import { isValid, parseISO } from 'date-fns';
import { z, type ZodTypeAny } from 'zod';

import { ValidationError } from '../errors';
import { isRecord } from '../typesafe';
import type { EnumMembers, EnumTable } from './enum';

export type FieldKind =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'datetime'
  | 'enum'
  | 'model'
  | 'list'
  | 'json';

type Presence = 'required' | 'optional' | 'nullable' | 'derived';

/** Decodes a present, non-null JSON value and renders it back for display. */
export interface FieldCodec<T> {
  decode(value: unknown, path: string): T;
  display(value: T): unknown;
}

/**
 * What a field needs from a nested model: enough to walk dotted column paths
 * to resolve header overrides and to render table cells. `Model` implements it.
 */
export interface ModelShape {
  readonly name: string;
  child(field: string): ModelShape | undefined;
  headerOverride(field: string): string | undefined;
  displayField(field: string, value: unknown): unknown;
}

/** Anything that can parse one object at a known path, i.e. a `Model`. */
export interface NestedParser<T> extends ModelShape {
  parseAt(raw: unknown, path: string): T;
  toDisplay(entity: Readonly<Record<string, unknown>>): Record<string, unknown>;
}

type FieldState = {
  kind: FieldKind;
  alias: string | undefined;
  presence: Presence;
  defaultValue: unknown;
  excluded: boolean;
  target: ModelShape | undefined;
};

export class Field<T> {
  declare readonly __type?: T;

  constructor(
    private readonly codec: FieldCodec<unknown>,
    private readonly state: FieldState
  ) {}

  get kind(): FieldKind {
    return this.state.kind;
  }

  get alias(): string | undefined {
    return this.state.alias;
  }

  get excluded(): boolean {
    return this.state.excluded;
  }

  get derived(): boolean {
    return this.state.presence === 'derived';
  }

  /** Nested model reached through this field, for `model` and `list(model)` fields. */
  get target(): ModelShape | undefined {
    return this.state.target;
  }

  /** Read the value from a different JSON key than the field's own name. */
  from(alias: string): Field<T> {
    return new Field<T>(this.codec, { ...this.state, alias });
  }

  /** Missing or null in the payload yields `defaultValue`, or `null` without one. */
  optional(): Field<T | null>;
  optional(defaultValue: T): Field<T>;
  optional(defaultValue?: T): Field<T | null> {
    const fallback = defaultValue === undefined ? null : Object.freeze(defaultValue);
    return new Field<T | null>(this.codec, { ...this.state, presence: 'optional', defaultValue: fallback });
  }

  /** The key must be present, but its value may be null. */
  nullable(): Field<T | null> {
    return new Field<T | null>(this.codec, { ...this.state, presence: 'nullable' });
  }

  /** Leave the field out of `toDisplay` output. */
  exclude(): Field<T> {
    return new Field<T>(this.codec, { ...this.state, excluded: true });
  }

  /**
   * Pull the field out of a JSON object.
   *
   * @param source - the raw object being parsed
   * @param name - internal field name, used when no alias is set
   * @param path - dotted internal path, used in errors
   */
  read(source: Record<string, unknown>, name: string, path: string): unknown {
    if (this.state.presence === 'derived') return null;

    const key = this.state.alias ?? name;
    const value = source[key];

    if (value === undefined || value === null) {
      switch (this.state.presence) {
        case 'optional':
          return this.state.defaultValue;
        case 'nullable':
          if (value === null) return null;
          throw new ValidationError({ path, reason: `field required (key "${key}")` });
        default:
          throw new ValidationError({
            path,
            reason: value === null ? `may not be null (key "${key}")` : `field required (key "${key}")`,
          });
      }
    }

    return this.codec.decode(value, path);
  }

  /** Decode a bare value, as list items are. */
  decodeValue(value: unknown, path: string): unknown {
    if (value === undefined || value === null) {
      throw new ValidationError({ path, reason: 'may not be null' });
    }
    return this.codec.decode(value, path);
  }

  display(value: unknown): unknown {
    if (value === null || value === undefined) return null;
    return this.codec.display(value);
  }
}

/** A value filled in after parsing by the façade layer, never read from JSON. */
export class DerivedField<T> extends Field<T | null> {
  readonly derivedBrand = true as const;
}

function issueReason(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? issue.message : 'invalid value';
}

function zodCodec(schema: ZodTypeAny): FieldCodec<unknown> {
  return {
    decode(value, path) {
      const result = schema.safeParse(value);
      if (result.success) return result.data;
      throw new ValidationError({ path, reason: issueReason(result.error), value });
    },
    display: (value) => value,
  };
}

const NUMERIC_STRING = /^\s*-?\d+(\.\d+)?\s*$/;

function coerceNumeric(value: unknown): unknown {
  return typeof value === 'string' && NUMERIC_STRING.test(value) ? Number(value) : value;
}

function coerceBoolean(value: unknown): unknown {
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  if (value === 1) return true;
  if (value === 0) return false;
  return value;
}

const OFFSET_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
// Below this magnitude a number is epoch seconds, above it epoch milliseconds
const EPOCH_SECONDS_LIMIT = 2e10;

export type DatetimeOptions = {
  /** Offset applied to timestamps that carry none, e.g. `"Z"` or `"-05:00"`. */
  zone?: string;
};

export function parseDatetime(value: unknown, zone: string = 'Z'): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const millis = Math.abs(value) <= EPOCH_SECONDS_LIMIT ? value * 1000 : value;
    return new Date(millis);
  }
  if (typeof value !== 'string' || value.trim() === '') return null;

  let text = value.trim();
  if (DATE_ONLY.test(text)) text = `${text}T00:00:00`;
  if (!OFFSET_SUFFIX.test(text)) text = `${text}${zone}`;

  const parsed = parseISO(text);
  return isValid(parsed) ? parsed : null;
}

function datetimeCodec(zone: string): FieldCodec<unknown> {
  return {
    decode(value, path) {
      const parsed = parseDatetime(value, zone);
      if (parsed) return parsed;
      throw new ValidationError({ path, reason: 'invalid datetime', value });
    },
    display: (value) => (value instanceof Date ? value.toISOString() : value),
  };
}

function enumCodec<M extends EnumMembers>(table: EnumTable<M>): FieldCodec<unknown> {
  return {
    decode(value, path) {
      const resolved = typeof value === 'string' ? table.fromValue(value) : undefined;
      if (resolved !== undefined) return resolved;
      throw new ValidationError({ path, reason: `not a valid ${table.name}`, value, allowed: table.values });
    },
    display: (value) => value,
  };
}

function modelCodec<T>(model: NestedParser<T>): FieldCodec<unknown> {
  return {
    decode: (value, path) => model.parseAt(value, path),
    display: (value) => (isRecord(value) ? model.toDisplay(value) : value),
  };
}

function listCodec(item: Field<unknown>): FieldCodec<unknown> {
  return {
    decode(value, path) {
      if (!Array.isArray(value)) {
        throw new ValidationError({ path, reason: 'expected a list', value });
      }
      return Object.freeze(value.map((entry, index) => item.decodeValue(entry, `${path}.${index}`)));
    },
    display(value) {
      return Array.isArray(value) ? value.map((entry) => item.display(entry)) : value;
    },
  };
}

function base(kind: FieldKind, codec: FieldCodec<unknown>, target?: ModelShape): FieldState & { codec: FieldCodec<unknown> } {
  return { kind, codec, alias: undefined, presence: 'required', defaultValue: null, excluded: false, target };
}

function make<T>(kind: FieldKind, codec: FieldCodec<unknown>, target?: ModelShape): Field<T> {
  const { codec: c, ...state } = base(kind, codec, target);
  return new Field<T>(c, state);
}

/**
 * Field builders. Every builder starts required; chain `.from()`, `.optional()`,
 * `.nullable()` and `.exclude()` to adjust.
 *
 * @example
 * ```ts
 * const Coach = defineModel('Coach', {
 *   coachUuid: field.string().from('coachUUId'),
 *   name: field.string(),
 *   imageUrl: field.string().from('imageUrl').optional().exclude(),
 * });
 * ```
 */
export const field = {
  string: (): Field<string> => make<string>('string', zodCodec(z.string())),

  number: (): Field<number> => make<number>('number', zodCodec(z.preprocess(coerceNumeric, z.number()))),

  integer: (): Field<number> =>
    make<number>('integer', zodCodec(z.preprocess(coerceNumeric, z.number().int()))),

  boolean: (): Field<boolean> => make<boolean>('boolean', zodCodec(z.preprocess(coerceBoolean, z.boolean()))),

  datetime: (options: DatetimeOptions = {}): Field<Date> => make<Date>('datetime', datetimeCodec(options.zone ?? 'Z')),

  enum: <M extends EnumMembers>(table: EnumTable<M>): Field<M[keyof M & string]> =>
    make<M[keyof M & string]>('enum', enumCodec(table)),

  model: <T>(model: NestedParser<T>): Field<T> => make<T>('model', modelCodec(model), model),

  list: <T>(item: Field<T>): Field<readonly T[]> => make<readonly T[]>('list', listCodec(item), item.target),

  /** Passed through untouched, for opaque payloads such as telemetry samples. */
  json: (): Field<unknown> => make<unknown>('json', zodCodec(z.unknown())),

  derived: <T>(): DerivedField<T> => {
    const { codec, ...state } = base('json', zodCodec(z.unknown()));
    return new DerivedField<T>(codec, { ...state, presence: 'derived' });
  },
};

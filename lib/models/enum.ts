/**
 * Fixed (name, value) sets for status-like fields.
 *
 * Each table is built once when the module loads. Both directions compare
 * lowercased strings, so `"active"`, `"Active"` and `"ACTIVE"` resolve to the
 * same member.
 */

export type EnumMembers = Readonly<Record<string, string>>;

type Member<M extends EnumMembers> = M[keyof M & string];

export type EnumValue<E> = E extends EnumTable<infer M> ? Member<M> : never;

function isMemberName<M extends EnumMembers>(members: M, key: string): key is keyof M & string {
  return key in members;
}

export class EnumTable<M extends EnumMembers> {
  private readonly byValue: ReadonlyMap<string, Member<M>>;
  private readonly byName: ReadonlyMap<string, keyof M & string>;

  constructor(
    readonly name: string,
    readonly members: M
  ) {
    const byValue = new Map<string, Member<M>>();
    const byName = new Map<string, keyof M & string>();
    for (const [key, text] of Object.entries(members)) {
      if (!isMemberName(members, key)) continue;
      const lowered = text.toLowerCase();
      if (byValue.has(lowered)) {
        throw new Error(`${name}: duplicate value ${text}`);
      }
      const memberKey: keyof M & string = key;
      byValue.set(lowered, members[memberKey]);
      byName.set(key.toLowerCase(), key);
    }
    this.byValue = byValue;
    this.byName = byName;
  }

  get names(): Array<keyof M & string> {
    return Object.keys(this.members).filter((key) => isMemberName(this.members, key));
  }

  get values(): Array<Member<M>> {
    return this.names.map((key) => this.members[key]);
  }

  /** External value (`"checked in"`) → canonical value (`"Checked In"`). */
  fromValue(value: string): Member<M> | undefined {
    return this.byValue.get(value.toLowerCase());
  }

  /** Member name (`"checkedin"`) → canonical value (`"Checked In"`). */
  fromName(name: string): Member<M> | undefined {
    const key = this.byName.get(name.toLowerCase());
    return key === undefined ? undefined : this.members[key];
  }

  /** Canonical value → member name, for flag-style inputs without spaces. */
  nameOf(value: Member<M>): keyof M & string {
    const found = this.names.find((key) => this.members[key] === value);
    if (found === undefined) {
      throw new Error(`${this.name}: ${String(value)} is not a member`);
    }
    return found;
  }

  has(value: string): boolean {
    return this.byValue.has(value.toLowerCase());
  }
}

export function defineEnum<const M extends EnumMembers>(name: string, members: M): EnumTable<M> {
  return new EnumTable(name, members);
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATS: Readonly<Record<string, number>> = Object.freeze({
  inf: Number.POSITIVE_INFINITY,
  "+inf": Number.POSITIVE_INFINITY,
  "-inf": Number.NEGATIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
  "+infinity": Number.POSITIVE_INFINITY,
  "-infinity": Number.NEGATIVE_INFINITY,
  nan: Number.NaN,
});
const TRUE_FLAGS = new Set(["yes", "true", "on", "1"]);
const FALSE_FLAGS = new Set(["no", "false", "off", "0"]);

export function isIntegerText(text: string): boolean {
  return INTEGER_PATTERN.test(text.trim());
}

/** Integers past `Number.MAX_SAFE_INTEGER` in magnitude cannot be held exactly and are refused. */
export function parseIntStrict(text: string): number | undefined {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function parseFloatStrict(text: string): number | undefined {
  const trimmed = text.trim();
  const special = SPECIAL_FLOATS[trimmed.toLowerCase()];
  if (special !== undefined) {
    return special;
  }
  if (!FLOAT_PATTERN.test(trimmed)) {
    return undefined;
  }
  return Number.parseFloat(trimmed);
}

/**
 * One flat record produced by a resource job. Every stored value is a string;
 * the typed accessors return `undefined` instead of throwing when the field is
 * absent or does not parse.
 */
export class ResourceRecord {
  private readonly fields: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]>) {
    this.fields = new Map(entries);
  }

  static from(data: Readonly<Record<string, string>>): ResourceRecord {
    return new ResourceRecord(Object.entries(data));
  }

  get size(): number {
    return this.fields.size;
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  text(field: string): string | undefined {
    return this.fields.get(field);
  }

  int(field: string): number | undefined {
    const raw = this.fields.get(field);
    return raw === undefined ? undefined : parseIntStrict(raw);
  }

  float(field: string): number | undefined {
    const raw = this.fields.get(field);
    return raw === undefined ? undefined : parseFloatStrict(raw);
  }

  flag(field: string): boolean | undefined {
    const raw = this.fields.get(field)?.trim().toLowerCase();
    if (raw === undefined) {
      return undefined;
    }
    if (TRUE_FLAGS.has(raw)) {
      return true;
    }
    if (FALSE_FLAGS.has(raw)) {
      return false;
    }
    return undefined;
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  values(): string[] {
    return [...this.fields.values()];
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.fields);
  }

  toString(): string {
    return `ResourceRecord(${JSON.stringify(this.toJSON())})`;
  }
}

import type { ScalarStyle } from './events';

// Composed YAML values. Collections hold children directly; with
// `aliases: 'share'` one child object may appear under several parents.

export type ValueType = 'null' | 'bool' | 'int' | 'float' | 'string' | 'sequence' | 'mapping';

/** Presentation and provenance hints. None of them affect equality. */
interface ValueHints {
  /** Resolved tag URI, set only when it differs from the type's default tag. */
  tag?: string;
  /** Anchor name the node carried in the source. */
  anchor?: string;
}

export interface NullValue extends ValueHints {
  type: 'null';
}

export interface BoolValue extends ValueHints {
  type: 'bool';
  value: boolean;
}

export interface IntValue extends ValueHints {
  type: 'int';
  /** A bigint only outside the safe integer range. */
  value: number | bigint;
}

export interface FloatValue extends ValueHints {
  type: 'float';
  value: number;
}

export interface StringValue extends ValueHints {
  type: 'string';
  value: string;
  /** Source scalar style, recorded when loading with `captureStyle`. */
  style?: ScalarStyle;
}

export interface SequenceValue extends ValueHints {
  type: 'sequence';
  items: Value[];
  /** Whether the source used `[...]`, recorded with `captureStyle`. */
  flow?: boolean;
}

export interface MappingEntry {
  key: Value;
  value: Value;
}

export interface MappingValue extends ValueHints {
  type: 'mapping';
  /** Entries in source order. Keys are unique under {@link valuesEqual}. */
  entries: MappingEntry[];
  flow?: boolean;
}

export type ScalarValue = NullValue | BoolValue | IntValue | FloatValue | StringValue;
export type CollectionValue = SequenceValue | MappingValue;
export type Value = ScalarValue | CollectionValue;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export function nullValue(): NullValue {
  return { type: 'null' };
}

export function boolValue(value: boolean): BoolValue {
  return { type: 'bool', value };
}

export function intValue(value: number | bigint): IntValue {
  if (typeof value === 'bigint' && value >= MIN_SAFE && value <= MAX_SAFE) return { type: 'int', value: Number(value) };
  return { type: 'int', value };
}

export function floatValue(value: number): FloatValue {
  return { type: 'float', value };
}

export function stringValue(value: string): StringValue {
  return { type: 'string', value };
}

export function sequenceValue(items: Value[] = []): SequenceValue {
  return { type: 'sequence', items };
}

export function mappingValue(entries: MappingEntry[] = []): MappingValue {
  return { type: 'mapping', entries };
}

export function isCollection(value: Value): value is CollectionValue {
  return value.type === 'sequence' || value.type === 'mapping';
}

/** Render a float so it reads back as a float: `1.0`, `.inf`, `-.inf`, `.nan`. */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return '.nan';
  if (value === Infinity) return '.inf';
  if (value === -Infinity) return '-.inf';
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

/**
 * A string that is equal for two values exactly when {@link valuesEqual} holds.
 * Used to keep mapping keys unique.
 */
export function canonicalKey(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'n';
    case 'bool':
      return value.value ? 'b:1' : 'b:0';
    case 'int':
      return `i:${value.value}`;
    case 'float':
      return `f:${Number.isNaN(value.value) ? 'nan' : String(value.value)}`;
    case 'string':
      return `s:${JSON.stringify(value.value)}`;
    case 'sequence':
      return `[${value.items.map(canonicalKey).join(',')}]`;
    case 'mapping': {
      // Mappings are unordered, so compare their entries as a set.
      const parts = value.entries.map((entry) => `${canonicalKey(entry.key)}=${canonicalKey(entry.value)}`);
      parts.sort();
      return `{${parts.join(',')}}`;
    }
  }
}

/**
 * Structural equality. Mappings compare as unordered sets of entries, NaN
 * equals NaN, and hints (tag, anchor, style) are ignored.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a.type !== b.type) return false;
  return canonicalKey(a) === canonicalKey(b);
}

/**
 * Look up a mapping entry's value by key. A string argument matches a string key.
 */
export function mappingGet(mapping: MappingValue, key: string | Value): Value | undefined {
  const wanted = typeof key === 'string' ? stringValue(key) : key;
  const wantedKey = canonicalKey(wanted);
  for (const entry of mapping.entries) {
    if (entry.key.type === wanted.type && canonicalKey(entry.key) === wantedKey) return entry.value;
  }
  return undefined;
}

/** Deep structural copy. Shared children become separate copies. */
export function cloneValue(value: Value): Value {
  switch (value.type) {
    case 'sequence':
      return { ...value, items: value.items.map(cloneValue) };
    case 'mapping':
      return {
        ...value,
        entries: value.entries.map((entry) => ({ key: cloneValue(entry.key), value: cloneValue(entry.value) })),
      };
    default:
      return { ...value };
  }
}

// Flow-style text used where a non-string key has to become an object property.
function keyText(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'bool':
      return String(value.value);
    case 'int':
      return String(value.value);
    case 'float':
      return formatFloat(value.value);
    case 'string':
      return value.value;
    case 'sequence':
      return `[${value.items.map((item) => (item.type === 'string' ? JSON.stringify(item.value) : keyText(item))).join(', ')}]`;
    case 'mapping':
      return `{${value.entries
        .map((entry) => {
          const k = entry.key.type === 'string' ? JSON.stringify(entry.key.value) : keyText(entry.key);
          const v = entry.value.type === 'string' ? JSON.stringify(entry.value.value) : keyText(entry.value);
          return `${k}: ${v}`;
        })
        .join(', ')}}`;
  }
}

export type JSValue = null | boolean | number | bigint | string | JSValue[] | { [key: string]: JSValue };

/**
 * Convert to plain JavaScript data. Mappings become objects whose keys are
 * string keys as-is and other keys rendered as YAML flow text. Shared children
 * stay shared.
 */
export function toJS(value: Value, seen: Map<Value, JSValue> = new Map()): JSValue {
  const cached = seen.get(value);
  if (cached !== undefined) return cached;
  switch (value.type) {
    case 'null':
      return null;
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return value.value;
    case 'sequence': {
      const out: JSValue[] = [];
      seen.set(value, out);
      for (const item of value.items) out.push(toJS(item, seen));
      return out;
    }
    case 'mapping': {
      const out: { [key: string]: JSValue } = {};
      seen.set(value, out);
      for (const entry of value.entries) {
        // defineProperty keeps a "__proto__" key an own property.
        Object.defineProperty(out, keyText(entry.key), {
          value: toJS(entry.value, seen),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/**
 * Convert plain JavaScript data into a {@link Value}. Safe integers and
 * bigints become `int`, other numbers `float`; `Map` and plain objects become
 * mappings; `Date` becomes its ISO string.
 *
 * @throws {TypeError} On functions, symbols or cyclic input.
 */
export function fromJS(input: unknown, inProgress: Set<object> = new Set()): Value {
  if (input === null || input === undefined) return nullValue();
  switch (typeof input) {
    case 'boolean':
      return boolValue(input);
    case 'number':
      return Number.isSafeInteger(input) ? intValue(input) : floatValue(input);
    case 'bigint':
      return intValue(input);
    case 'string':
      return stringValue(input);
    case 'object':
      break;
    default:
      throw new TypeError(`Cannot convert ${typeof input} to a YAML value`);
  }
  if (input instanceof Date) return stringValue(input.toISOString());
  if (inProgress.has(input)) throw new TypeError('Cannot convert cyclic structure to a YAML value');
  inProgress.add(input);
  let result: Value;
  if (Array.isArray(input)) {
    result = sequenceValue(input.map((item: unknown) => fromJS(item, inProgress)));
  } else if (input instanceof Map) {
    const entries: MappingEntry[] = [];
    for (const [key, value] of input) {
      entries.push({ key: fromJS(key, inProgress), value: fromJS(value, inProgress) });
    }
    result = mappingValue(entries);
  } else {
    result = mappingValue(
      Object.entries(input).map(([key, value]) => ({ key: stringValue(key), value: fromJS(value, inProgress) })),
    );
  }
  inProgress.delete(input);
  return result;
}

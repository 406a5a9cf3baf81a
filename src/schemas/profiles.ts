import type { IntPattern, SchemaName, SchemaProfile } from './types';

/**
 * Freeze a Set at runtime and prevent mutation through prototype calls.
 */
function freezeSet<T>(set: Set<T>): ReadonlySet<T> {
  const frozen = new Proxy(set, {
    get(target, property) {
      if (property === 'add' || property === 'delete' || property === 'clear') {
        return () => {
          throw new TypeError('Cannot modify a frozen Set');
        };
      }
      const value: unknown = Reflect.get(target, property, target);
      return typeof value === 'function' ? value.bind(target) : value;
    },
  });
  Object.freeze(frozen);
  return frozen;
}

function makeProfile(
  name: SchemaName,
  options: {
    nullLiterals?: readonly string[];
    trueLiterals?: readonly string[];
    falseLiterals?: readonly string[];
    intPatterns?: readonly IntPattern[];
    floatPattern?: RegExp;
    specialFloats?: Readonly<Record<string, number>>;
    digitSeparators?: boolean;
  },
): SchemaProfile {
  const profile: SchemaProfile = {
    name,
    nullLiterals: freezeSet(new Set(options.nullLiterals ?? [])),
    trueLiterals: freezeSet(new Set(options.trueLiterals ?? [])),
    falseLiterals: freezeSet(new Set(options.falseLiterals ?? [])),
    intPatterns: Object.freeze([...(options.intPatterns ?? [])]),
    floatPattern: options.floatPattern ?? null,
    specialFloats: Object.freeze({ ...options.specialFloats }),
    digitSeparators: options.digitSeparators ?? false,
  };
  return Object.freeze(profile);
}

export const CORE_PROFILE: SchemaProfile = makeProfile('core', {
  nullLiterals: ['', '~', 'null', 'Null', 'NULL'],
  trueLiterals: ['true', 'True', 'TRUE'],
  falseLiterals: ['false', 'False', 'FALSE'],
  intPatterns: [
    { pattern: /^[-+]?0b[01_]+$/, radix: 2, prefixLength: 2 },
    { pattern: /^[-+]?0o[0-7_]+$/, radix: 8, prefixLength: 2 },
    { pattern: /^[-+]?0x[0-9a-fA-F_]+$/, radix: 16, prefixLength: 2 },
    { pattern: /^[-+]?[0-9][0-9_]*$/, radix: 10, prefixLength: 0 },
  ],
  floatPattern: /^[-+]?(?:\.[0-9]+|[0-9][0-9_]*(?:\.[0-9_]*)?)(?:[eE][-+]?[0-9]+)?$/,
  specialFloats: {
    '.inf': Infinity, '.Inf': Infinity, '.INF': Infinity,
    '+.inf': Infinity, '+.Inf': Infinity, '+.INF': Infinity,
    '-.inf': -Infinity, '-.Inf': -Infinity, '-.INF': -Infinity,
    '.nan': NaN, '.NaN': NaN, '.NAN': NaN,
  },
  digitSeparators: true,
});

export const JSON_PROFILE: SchemaProfile = makeProfile('json', {
  nullLiterals: ['null'],
  trueLiterals: ['true'],
  falseLiterals: ['false'],
  intPatterns: [{ pattern: /^-?(?:0|[1-9][0-9]*)$/, radix: 10, prefixLength: 0 }],
  floatPattern: /^-?(?:0|[1-9][0-9]*)(?:\.[0-9]*)?(?:[eE][-+]?[0-9]+)?$/,
});

export const FAILSAFE_PROFILE: SchemaProfile = makeProfile('failsafe', {});

export const SCHEMA_PROFILES: Readonly<Record<SchemaName, SchemaProfile>> = Object.freeze({
  core: CORE_PROFILE,
  json: JSON_PROFILE,
  failsafe: FAILSAFE_PROFILE,
});

export type SchemaName = 'core' | 'json' | 'failsafe';

export interface IntPattern {
  readonly pattern: RegExp;
  readonly radix: 2 | 8 | 10 | 16;
  /** Characters to drop before the digits, e.g. `0x`. */
  readonly prefixLength: number;
}

/**
 * The plain-scalar grammar of one schema: which untagged plain scalars become
 * null, bool, int or float. Everything else is a string.
 */
export interface SchemaProfile {
  readonly name: SchemaName;
  readonly nullLiterals: ReadonlySet<string>;
  readonly trueLiterals: ReadonlySet<string>;
  readonly falseLiterals: ReadonlySet<string>;
  readonly intPatterns: readonly IntPattern[];
  readonly floatPattern: RegExp | null;
  /** Spellings of infinity and NaN. */
  readonly specialFloats: Readonly<Record<string, number>>;
  /** Whether `_` digit separators are dropped from numbers. */
  readonly digitSeparators: boolean;
}

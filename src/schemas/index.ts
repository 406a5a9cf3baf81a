import {
  boolValue,
  floatValue,
  intValue,
  nullValue,
  stringValue,
  type ScalarValue,
} from '../value';
import { CORE_PROFILE, SCHEMA_PROFILES } from './profiles';
import type { IntPattern, SchemaName, SchemaProfile } from './types';

export { CORE_PROFILE, FAILSAFE_PROFILE, JSON_PROFILE, SCHEMA_PROFILES } from './profiles';
export type { IntPattern, SchemaName, SchemaProfile } from './types';

export function getSchema(name: SchemaName): SchemaProfile {
  return SCHEMA_PROFILES[name];
}

const RADIX_PREFIX: Readonly<Record<IntPattern['radix'], string>> = { 2: '0b', 8: '0o', 10: '', 16: '0x' };

// Digits beyond the safe range are reparsed as a bigint so the value stays exact.
function toIntValue(negative: boolean, digits: string, radix: IntPattern['radix']): ScalarValue {
  const value = parseInt(digits, radix);
  if (Number.isSafeInteger(value)) return intValue(negative ? -value : value);
  const big = BigInt(RADIX_PREFIX[radix] + digits);
  return intValue(negative ? -big : big);
}

/** Parse `text` as an integer under `profile`, or return null. */
export function parseIntLiteral(text: string, profile: SchemaProfile = CORE_PROFILE): ScalarValue | null {
  for (const { pattern, radix, prefixLength } of profile.intPatterns) {
    if (!pattern.test(text)) continue;
    const negative = text[0] === '-';
    let body = text;
    if (body[0] === '-' || body[0] === '+') body = body.slice(1);
    body = body.slice(prefixLength);
    if (profile.digitSeparators) body = body.replace(/_/g, '');
    if (body === '') return null;
    return toIntValue(negative, body, radix);
  }
  return null;
}

/** Parse `text` as a float under `profile`, or return null. */
export function parseFloatLiteral(text: string, profile: SchemaProfile = CORE_PROFILE): ScalarValue | null {
  const special = profile.specialFloats[text];
  if (special !== undefined) return floatValue(special);
  if (!profile.floatPattern?.test(text)) return null;
  const cleaned = profile.digitSeparators ? text.replace(/_/g, '') : text;
  const value = Number(cleaned);
  return Number.isNaN(value) ? null : floatValue(value);
}

export function parseBoolLiteral(text: string, profile: SchemaProfile = CORE_PROFILE): ScalarValue | null {
  if (profile.trueLiterals.has(text)) return boolValue(true);
  if (profile.falseLiterals.has(text)) return boolValue(false);
  return null;
}

export function parseNullLiteral(text: string, profile: SchemaProfile = CORE_PROFILE): ScalarValue | null {
  return profile.nullLiterals.has(text) ? nullValue() : null;
}

/**
 * Type an untagged plain scalar under `profile`: null, bool, int, float, or
 * string when nothing else matches.
 */
export function resolvePlainScalar(text: string, profile: SchemaProfile): ScalarValue {
  return (
    parseNullLiteral(text, profile) ??
    parseBoolLiteral(text, profile) ??
    parseIntLiteral(text, profile) ??
    parseFloatLiteral(text, profile) ??
    stringValue(text)
  );
}

/**
 * Value resolution: turns enumerator declarations into integer values and
 * maintains the per-type value tables.
 */

import {
  EnumGenError,
  type EnumType,
  type Extension,
  type RawEnumerator,
  type ValueSpec,
} from './types.js';

/** Base of the value range reserved for extension enumerators. */
export const EXTENSION_VALUE_BASE = 1_000_000_000;

/** Number of values reserved per extension. */
export const EXTENSION_VALUE_RANGE = 1000;

const DECIMAL_PATTERN = /^(0+|[1-9][0-9]*)$/;
const HEX_PATTERN = /^0[xX][0-9a-fA-F]+$/;
const OCTAL_PATTERN = /^0[oO][0-7]+$/;
const BINARY_PATTERN = /^0[bB][01]+$/;

/**
 * Parse an integer literal in decimal, hex (0x), octal (0o) or binary (0b)
 * form with an optional sign. Returns null when the text is not a literal.
 */
export function parseIntegerLiteral(text: string): number | null {
  const trimmed = text.trim();
  let sign = 1;
  let digits = trimmed;
  if (digits.startsWith('-') || digits.startsWith('+')) {
    sign = digits.startsWith('-') ? -1 : 1;
    digits = digits.slice(1);
  }

  let magnitude: number;
  if (DECIMAL_PATTERN.test(digits)) {
    magnitude = Number.parseInt(digits, 10);
  } else if (HEX_PATTERN.test(digits)) {
    magnitude = Number.parseInt(digits.slice(2), 16);
  } else if (OCTAL_PATTERN.test(digits)) {
    magnitude = Number.parseInt(digits.slice(2), 8);
  } else if (BINARY_PATTERN.test(digits)) {
    magnitude = Number.parseInt(digits.slice(2), 2);
  } else {
    return null;
  }

  if (!Number.isSafeInteger(magnitude)) {
    return null;
  }
  // Avoid -0 for "-0".
  return magnitude === 0 ? 0 : sign * magnitude;
}

/**
 * Compute the value of an extension enumerator.
 * e.g., extension 3, offset 0 -> 1000002000 (or -1000002000 for errors)
 */
export function computeOffsetValue(
  extensionNumber: number,
  offset: number,
  isError: boolean
): number {
  const value = EXTENSION_VALUE_BASE + (extensionNumber - 1) * EXTENSION_VALUE_RANGE + offset;
  return isError ? -value : value;
}

/**
 * Resolve a value specification against an enum type.
 */
export function resolveValue(enumType: EnumType, spec: ValueSpec): number {
  switch (spec.kind) {
    case 'literal':
      return spec.value;
    case 'alias': {
      const target = enumType.nameToValue.get(spec.alias);
      if (target === undefined) {
        throw new EnumGenError(
          'E_UNDECLARED_ALIAS',
          `Alias target "${spec.alias}" is not declared for ${enumType.name}`
        );
      }
      return target;
    }
    case 'offset':
      return computeOffsetValue(spec.extensionNumber, spec.offset, spec.isError);
  }
}

/**
 * Record `name` for an enum type and return its resolved value.
 *
 * The name always maps to the new value (last declaration wins). The value
 * keeps its current canonical name unless `name` is strictly shorter, so
 * "VK_FOO" beats "VK_FOO_EXT" whichever comes first.
 */
export function addValue(enumType: EnumType, name: string, spec: ValueSpec): number {
  const value = resolveValue(enumType, spec);

  enumType.nameToValue.set(name, value);
  const current = enumType.values.get(value);
  if (current === undefined || name.length < current.length) {
    enumType.values.set(value, name);
  }

  return value;
}

/**
 * Interpret raw enumerator attributes. `value` takes precedence over
 * `alias`, which takes precedence over `offset`.
 */
export function toValueSpec(raw: RawEnumerator, extension?: Extension): ValueSpec {
  if (raw.value !== undefined) {
    const value = parseIntegerLiteral(raw.value);
    if (value === null) {
      throw new EnumGenError(
        'E_MALFORMED_DECLARATION',
        `Enumerator "${raw.name}" has a non-integer value "${raw.value}"`
      );
    }
    return { kind: 'literal', value };
  }

  if (raw.alias !== undefined) {
    return { kind: 'alias', alias: raw.alias };
  }

  if (raw.offset === undefined) {
    throw new EnumGenError(
      'E_MALFORMED_DECLARATION',
      `Enumerator "${raw.name}" has none of value, alias or offset`
    );
  }

  const offset = parseIntegerLiteral(raw.offset);
  if (offset === null || offset < 0) {
    throw new EnumGenError(
      'E_MALFORMED_DECLARATION',
      `Enumerator "${raw.name}" has an invalid offset "${raw.offset}"`
    );
  }

  let extensionNumber: number;
  if (raw.extnumber !== undefined) {
    const parsed = parseIntegerLiteral(raw.extnumber);
    if (parsed === null || parsed < 1) {
      throw new EnumGenError(
        'E_MALFORMED_DECLARATION',
        `Enumerator "${raw.name}" has an invalid extnumber "${raw.extnumber}"`
      );
    }
    extensionNumber = parsed;
  } else if (extension !== undefined) {
    extensionNumber = extension.number;
  } else {
    throw new EnumGenError(
      'E_MALFORMED_DECLARATION',
      `Enumerator "${raw.name}" uses an offset outside an extension without extnumber`
    );
  }

  return {
    kind: 'offset',
    extensionNumber,
    offset,
    isError: raw.dir === '-',
  };
}

/**
 * Resolve a loaded `<enum>` declaration into an enum type.
 */
export function addValueFromDeclaration(
  enumType: EnumType,
  raw: RawEnumerator,
  extension?: Extension
): number {
  return addValue(enumType, raw.name, toValueSpec(raw, extension));
}

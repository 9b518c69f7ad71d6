/**
 * In-memory counterpart of the generated `vk_*_to_str` functions.
 */

import { EnumGenError, type EnumType } from './types.js';

/**
 * Result of looking up a value's canonical name.
 */
export type LookupResult =
  | { success: true; name: string }
  | { success: false; error: EnumGenError };

/**
 * Map a value back to its canonical name. Values that were never declared
 * for the type produce an E_UNRECOGNIZED_ENUMERATOR error, mirroring the
 * generated function's unreachable default case.
 */
export function enumToString(enumType: EnumType, value: number): LookupResult {
  const name = enumType.values.get(value);
  if (name === undefined) {
    return {
      success: false,
      error: new EnumGenError(
        'E_UNRECOGNIZED_ENUMERATOR',
        `Value ${value} is not an enumerator of ${enumType.name}`
      ),
    };
  }
  return { success: true, name };
}

/**
 * Values of an enum type in ascending numeric order.
 */
export function sortedValues(enumType: EnumType): number[] {
  return Array.from(enumType.values.keys()).sort((a, b) => a - b);
}

/**
 * Generate vk_enum_to_str.c from the resolved model.
 */

import { sortedValues, type EnumType } from '@vk-enum/shared';
import type { RegistryModel } from '../assembler.js';
import {
  DEFAULT_EMIT_OPTIONS,
  HEADER_FILENAME,
  bannerLines,
  toFunctionName,
  type EmitOptions,
} from './options.js';

/**
 * Escape a name for use inside a C string literal.
 */
function toCString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function generateFunction(
  enumType: EnumType,
  foreign: ReadonlySet<string>,
  lines: string[]
): void {
  lines.push('const char *');
  lines.push(`${toFunctionName(enumType.name)}(${enumType.name} input)`);
  lines.push('{');
  lines.push('    switch(input) {');

  for (const value of sortedValues(enumType)) {
    const name = enumType.values.get(value);
    if (name === undefined) continue;
    const isForeign = foreign.has(name);

    if (isForeign) {
      lines.push('    #pragma GCC diagnostic push');
      lines.push('    #pragma GCC diagnostic ignored "-Wswitch"');
    }
    lines.push(`    case ${value}:`);
    lines.push(`        return ${toCString(name)};`);
    if (isForeign) {
      lines.push('    #pragma GCC diagnostic pop');
    }
  }

  lines.push('    default:');
  lines.push('        unreachable("Undefined enum value.");');
  lines.push('    }');
  lines.push('}');
}

/**
 * Generate the vk_enum_to_str.c file content.
 */
export function generateSource(
  model: RegistryModel,
  options: EmitOptions = DEFAULT_EMIT_OPTIONS
): string {
  const lines: string[] = [];
  const foreign = new Set(options.foreignEnumValues);

  lines.push(...bannerLines(options));
  lines.push('');
  lines.push('#include <vulkan/vulkan.h>');
  lines.push('#include <vulkan/vk_android_native_buffer.h>');
  lines.push('#include "util/macros.h"');
  lines.push(`#include "${HEADER_FILENAME}"`);

  for (const enumType of model.enums) {
    lines.push('');
    generateFunction(enumType, foreign, lines);
  }
  lines.push('');

  return lines.join('\n');
}

/**
 * Generate vk_enum_to_str.h from the resolved model.
 */

import type { RegistryModel } from '../assembler.js';
import {
  DEFAULT_EMIT_OPTIONS,
  bannerLines,
  toFunctionName,
  type EmitOptions,
} from './options.js';

const INCLUDE_GUARD = 'VK_ENUM_TO_STR_H';

/**
 * Generate the vk_enum_to_str.h file content.
 */
export function generateHeader(
  model: RegistryModel,
  options: EmitOptions = DEFAULT_EMIT_OPTIONS
): string {
  const lines: string[] = [];

  // Banner, guard and includes
  lines.push(...bannerLines(options));
  lines.push('');
  lines.push(`#ifndef ${INCLUDE_GUARD}`);
  lines.push(`#define ${INCLUDE_GUARD}`);
  lines.push('');
  lines.push('#include <vulkan/vulkan.h>');
  lines.push('#include <vulkan/vk_android_native_buffer.h>');
  lines.push('');
  lines.push('#ifdef __cplusplus');
  lines.push('extern "C" {');
  lines.push('#endif');
  lines.push('');

  // Extension numbers
  for (const extension of model.extensions) {
    lines.push(`#define _${extension.name}_number (${extension.number})`);
  }
  if (model.extensions.length > 0) {
    lines.push('');
  }

  // Prototypes
  for (const enumType of model.enums) {
    lines.push(`const char * ${toFunctionName(enumType.name)}(${enumType.name} input);`);
  }
  if (model.enums.length > 0) {
    lines.push('');
  }

  lines.push('#ifdef __cplusplus');
  lines.push('} /* extern "C" */');
  lines.push('#endif');
  lines.push('');
  lines.push('#endif');
  lines.push('');

  return lines.join('\n');
}

/**
 * Options shared by the C generators.
 */

export interface EmitOptions {
  /** Tool name written into the generated-file banner. */
  generatedBy: string;
  /**
   * Enumerators declared outside their enum block. Their switch cases are
   * wrapped in pragmas that silence -Wswitch.
   */
  foreignEnumValues: readonly string[];
}

export const DEFAULT_EMIT_OPTIONS: EmitOptions = {
  generatedBy: 'vk-enum-to-str',
  foreignEnumValues: ['VK_STRUCTURE_TYPE_NATIVE_BUFFER_ANDROID'],
};

/** Generated source file name. */
export const SOURCE_FILENAME = 'vk_enum_to_str.c';

/** Generated header file name. */
export const HEADER_FILENAME = 'vk_enum_to_str.h';

/**
 * Function name for an enum type.
 * e.g., "VkResult" -> "vk_Result_to_str"
 */
export function toFunctionName(enumName: string): string {
  const stem = enumName.startsWith('Vk') ? enumName.slice(2) : enumName;
  return `vk_${stem}_to_str`;
}

/**
 * Banner lines at the top of every generated file.
 */
export function bannerLines(options: EmitOptions): string[] {
  return [
    '/* Autogenerated file -- do not edit',
    ` * generated by ${options.generatedBy}`,
    ' */',
  ];
}

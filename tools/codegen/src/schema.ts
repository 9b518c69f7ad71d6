/**
 * Zod schemas for registry element attributes, and the loaded document shape.
 */

import { z } from 'zod';
import type { RawEnumerator } from '@vk-enum/shared';

/**
 * The only `supported` value whose extensions are processed.
 */
export const SUPPORTED_API = 'vulkan';

/**
 * Attributes of an `<enums>` block.
 */
export const EnumsBlockAttrsSchema = z.object({
  /** Enum type name (e.g., "VkResult"). */
  name: z.string().min(1).describe('Enum type name'),

  /** Block kind; only "enum" blocks are loaded. */
  type: z.string().optional().describe('Block kind (enum, bitmask, ...)'),
});

/**
 * Attributes of an `<enum>` element.
 */
export const EnumeratorAttrsSchema = z.object({
  name: z.string().min(1).describe('Enumerator name'),
  value: z.string().optional().describe('Integer literal'),
  alias: z.string().optional().describe('Name whose value is reused'),
  offset: z.string().optional().describe('Offset within the extension range'),
  extnumber: z.string().optional().describe('Extension number override'),
  dir: z.string().optional().describe('"-" for negative (error) values'),
  extends: z.string().optional().describe('Enum type being extended'),
});

/**
 * Attributes of an `<enum>` element that extends another type. The name is
 * only required once the extended type is known to be loaded.
 */
export const ExtendingEnumeratorAttrsSchema = EnumeratorAttrsSchema.extend({
  name: z.string().optional().describe('Enumerator name'),
  extends: z.string().describe('Enum type being extended'),
});

/**
 * Attributes of an `<extension>` element.
 */
export const ExtensionAttrsSchema = z.object({
  name: z.string().min(1).describe('Extension name'),

  number: z
    .string()
    .regex(/^[0-9]+$/, 'Extension number must be a decimal integer')
    .transform((text) => Number.parseInt(text, 10))
    .pipe(z.number().int().positive())
    .describe('Registry-assigned extension number'),

  supported: z.string().optional().describe('APIs supporting the extension'),
});

export type EnumsBlockAttrs = z.output<typeof EnumsBlockAttrsSchema>;
export type EnumeratorAttrs = z.output<typeof EnumeratorAttrsSchema>;
export type ExtensionAttrs = z.output<typeof ExtensionAttrsSchema>;

/**
 * An enumerator declared outside its type's block, not yet interpreted.
 */
export type ExtendingEnumerator = Omit<RawEnumerator, 'name'> & {
  name?: string;
  extends: string;
};

/**
 * A base `<enums type="enum">` block.
 */
export interface EnumBlock {
  name: string;
  enumerators: RawEnumerator[];
}

/**
 * A supported `<extension>` with the enumerators it adds to other types.
 */
export interface ExtensionBlock {
  name: string;
  number: number;
  enumerators: ExtendingEnumerator[];
}

/**
 * The parts of one registry document that take part in resolution,
 * each in document order.
 */
export interface RegistryDocument {
  /** File path or label used in diagnostics. */
  source: string;
  enumBlocks: EnumBlock[];
  /** `feature/require/enum[@extends]` declarations. */
  featureEnumerators: ExtendingEnumerator[];
  extensions: ExtensionBlock[];
}

/**
 * Validation error with details.
 */
export interface ValidationError {
  path: (string | number)[];
  message: string;
}

/**
 * Validate element attributes against a schema, appending any errors under
 * `path`. Returns the parsed attributes, or undefined when invalid.
 */
export function validateAttributes<S extends z.ZodTypeAny>(
  schema: S,
  attrs: Record<string, string>,
  path: (string | number)[],
  errors: ValidationError[]
): z.output<S> | undefined {
  const result = schema.safeParse(attrs);
  if (result.success) {
    return result.data;
  }

  for (const issue of result.error.errors) {
    errors.push({
      path: [...path, ...issue.path],
      message: issue.message,
    });
  }
  return undefined;
}

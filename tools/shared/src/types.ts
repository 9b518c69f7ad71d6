/**
 * Core types for enum-to-string generation.
 */

/**
 * A named enumeration type collected from the registry.
 */
export interface EnumType {
  /** Declared type name (e.g., "VkResult"). */
  name: string;
  /** Integer value -> canonical enumerator name (one per distinct value). */
  values: Map<number, string>;
  /** Every declared name, aliases included -> resolved value. */
  nameToValue: Map<string, number>;
}

/**
 * An extension contributing enumerators to existing enum types.
 */
export interface Extension {
  /** Declared extension name (e.g., "VK_KHR_swapchain"). */
  name: string;
  /** 1-based registry-assigned number, used by offset values. */
  number: number;
}

/**
 * Literal integer value.
 */
export interface LiteralValue {
  kind: 'literal';
  value: number;
}

/**
 * Reuses the value of another name declared for the same enum type.
 */
export interface AliasValue {
  kind: 'alias';
  alias: string;
}

/**
 * Extension-relative value.
 */
export interface OffsetValue {
  kind: 'offset';
  extensionNumber: number;
  offset: number;
  /** Negates the computed value (status/error enumerators). */
  isError: boolean;
}

/**
 * How a single enumerator declares its value.
 */
export type ValueSpec = LiteralValue | AliasValue | OffsetValue;

/**
 * Attributes of an `<enum>` element as loaded, before interpretation.
 */
export interface RawEnumerator {
  name: string;
  value?: string;
  alias?: string;
  offset?: string;
  extnumber?: string;
  dir?: string;
  extends?: string;
}

/**
 * Error codes for fatal resolution failures.
 */
export type ErrorKind =
  | 'E_MALFORMED_DECLARATION'
  | 'E_UNDECLARED_ALIAS'
  | 'E_UNRECOGNIZED_ENUMERATOR';

/**
 * Error raised while resolving enumerators.
 */
export class EnumGenError extends Error {
  readonly code: ErrorKind;

  constructor(code: ErrorKind, message: string) {
    super(message);
    this.name = 'EnumGenError';
    this.code = code;
  }
}

/**
 * Create an empty enum type.
 */
export function createEnumType(name: string): EnumType {
  return { name, values: new Map(), nameToValue: new Map() };
}

/**
 * Create an extension record.
 */
export function createExtension(name: string, args: { number: number }): Extension {
  return { name, number: args.number };
}

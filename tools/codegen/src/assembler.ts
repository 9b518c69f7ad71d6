/**
 * Model assembly: feeds loaded registry documents through the symbol
 * factories and the value resolver.
 */

import {
  EnumGenError,
  addValueFromDeclaration,
  createEnumType,
  createExtension,
  createNamedFactory,
  type EnumType,
  type Extension,
  type NamedFactory,
  type RawEnumerator,
} from '@vk-enum/shared';
import {
  EnumeratorAttrsSchema,
  type ExtendingEnumerator,
  type RegistryDocument,
} from './schema.js';

/**
 * A declaration that was skipped because the type it extends is not loaded.
 */
export interface SkippedReference {
  /** Document the declaration came from. */
  source: string;
  /** The `extends` target that was not found. */
  target: string;
  /** Enumerator name, when the declaration has one. */
  name?: string;
}

/**
 * State shared across every document of one run.
 */
export interface AssemblyState {
  enums: NamedFactory<EnumType, void>;
  extensions: NamedFactory<Extension, { number: number }>;
  skipped: SkippedReference[];
}

/**
 * The resolved model handed to the generators.
 */
export interface RegistryModel {
  /** Enum types sorted by name. */
  enums: EnumType[];
  /** Extensions sorted by name. */
  extensions: Extension[];
  skipped: SkippedReference[];
}

/**
 * Create empty assembly state.
 */
export function createAssemblyState(): AssemblyState {
  return {
    enums: createNamedFactory<EnumType, void>((name) => createEnumType(name)),
    extensions: createNamedFactory(createExtension),
    skipped: [],
  };
}

/**
 * Check an extending declaration once its target is known.
 */
function toRawEnumerator(enumerator: ExtendingEnumerator): RawEnumerator {
  const result = EnumeratorAttrsSchema.safeParse(enumerator);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new EnumGenError(
      'E_MALFORMED_DECLARATION',
      `Declaration extending ${enumerator.extends} is invalid (${issues})`
    );
  }
  return result.data;
}

function resolveExtending(
  state: AssemblyState,
  source: string,
  enumerator: ExtendingEnumerator,
  extension?: Extension
): void {
  const target = state.enums.lookup(enumerator.extends);
  if (target === undefined) {
    state.skipped.push({ source, target: enumerator.extends, name: enumerator.name });
    return;
  }
  addValueFromDeclaration(target, toRawEnumerator(enumerator), extension);
}

/**
 * Resolve one document into the state. Base enum blocks are processed
 * first, then feature-level extending enumerators, then extension blocks.
 *
 * Throws EnumGenError on a malformed declaration or an undeclared alias.
 */
export function assembleDocument(state: AssemblyState, document: RegistryDocument): void {
  for (const block of document.enumBlocks) {
    const enumType = state.enums.getOrCreate(block.name, undefined);
    for (const enumerator of block.enumerators) {
      addValueFromDeclaration(enumType, enumerator);
    }
  }

  for (const enumerator of document.featureEnumerators) {
    resolveExtending(state, document.source, enumerator);
  }

  for (const block of document.extensions) {
    const extension = state.extensions.getOrCreate(block.name, { number: block.number });
    for (const enumerator of block.enumerators) {
      resolveExtending(state, document.source, enumerator, extension);
    }
  }
}

/**
 * Snapshot the state as a model with name-sorted enums and extensions.
 */
export function finalizeModel(state: AssemblyState): RegistryModel {
  return {
    enums: state.enums.sorted(),
    extensions: state.extensions.sorted(),
    skipped: [...state.skipped],
  };
}

/**
 * Assemble documents in the given order into one model.
 */
export function assembleModel(documents: RegistryDocument[]): RegistryModel {
  const state = createAssemblyState();
  for (const document of documents) {
    assembleDocument(state, document);
  }
  return finalizeModel(state);
}

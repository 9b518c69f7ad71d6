/**
 * Loader for registry XML documents (vk.xml layout).
 */

import * as fs from 'node:fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { RawEnumerator } from '@vk-enum/shared';
import {
  EnumeratorAttrsSchema,
  EnumsBlockAttrsSchema,
  ExtendingEnumeratorAttrsSchema,
  ExtensionAttrsSchema,
  SUPPORTED_API,
  validateAttributes,
  type EnumBlock,
  type ExtendingEnumerator,
  type ExtensionBlock,
  type RegistryDocument,
  type ValidationError,
} from './schema.js';

/**
 * Parse result.
 */
export type ParseResult =
  | { success: true; document: RegistryDocument }
  | { success: false; errors: ValidationError[] };

const ATTR_PREFIX = '@_';

/**
 * A parsed element: attributes under ATTR_PREFIX keys, children as arrays.
 */
type XmlElement = { [key: string]: unknown };

function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    parseAttributeValue: false,
    parseTagValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    // Every element becomes an array so sibling order is kept uniformly.
    isArray: (_tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute,
  });
}

function isElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child elements named `tag`, in document order.
 */
function childElements(node: XmlElement, tag: string): XmlElement[] {
  const value = node[tag];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isElement);
}

function attributesOf(node: XmlElement): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTR_PREFIX) && typeof value === 'string') {
      attrs[key.slice(ATTR_PREFIX.length)] = value;
    }
  }
  return attrs;
}

function findRoot(data: unknown): XmlElement | undefined {
  if (!isElement(data)) {
    return undefined;
  }
  for (const [key, value] of Object.entries(data)) {
    if (key.startsWith('?') || key.startsWith('#') || key.startsWith(ATTR_PREFIX)) {
      continue;
    }
    if (Array.isArray(value)) {
      const first: unknown = value[0];
      if (isElement(first)) {
        return first;
      }
    }
  }
  return undefined;
}

/**
 * Collect `<enum extends="...">` children of a `<require>` element.
 */
function collectExtending(
  requireBlock: XmlElement,
  path: (string | number)[],
  errors: ValidationError[]
): ExtendingEnumerator[] {
  const enumerators: ExtendingEnumerator[] = [];
  childElements(requireBlock, 'enum').forEach((child, index) => {
    const attrs = attributesOf(child);
    if (attrs.extends === undefined) {
      return;
    }
    const parsed = validateAttributes(
      ExtendingEnumeratorAttrsSchema,
      attrs,
      [...path, 'enum', index],
      errors
    );
    if (parsed !== undefined) {
      enumerators.push(parsed);
    }
  });
  return enumerators;
}

function loadEnumBlocks(root: XmlElement, errors: ValidationError[]): EnumBlock[] {
  const blocks: EnumBlock[] = [];
  childElements(root, 'enums').forEach((block, blockIndex) => {
    const attrs = attributesOf(block);
    if (attrs.type !== 'enum') {
      return;
    }
    const path = ['enums', blockIndex];
    const blockAttrs = validateAttributes(EnumsBlockAttrsSchema, attrs, path, errors);

    const enumerators: RawEnumerator[] = [];
    childElements(block, 'enum').forEach((child, index) => {
      const parsed = validateAttributes(
        EnumeratorAttrsSchema,
        attributesOf(child),
        [...path, 'enum', index],
        errors
      );
      if (parsed !== undefined) {
        enumerators.push(parsed);
      }
    });

    if (blockAttrs !== undefined) {
      blocks.push({ name: blockAttrs.name, enumerators });
    }
  });
  return blocks;
}

function loadFeatureEnumerators(
  root: XmlElement,
  errors: ValidationError[]
): ExtendingEnumerator[] {
  const enumerators: ExtendingEnumerator[] = [];
  childElements(root, 'feature').forEach((feature, featureIndex) => {
    childElements(feature, 'require').forEach((requireBlock, requireIndex) => {
      enumerators.push(
        ...collectExtending(
          requireBlock,
          ['feature', featureIndex, 'require', requireIndex],
          errors
        )
      );
    });
  });
  return enumerators;
}

function loadExtensions(root: XmlElement, errors: ValidationError[]): ExtensionBlock[] {
  const extensions: ExtensionBlock[] = [];
  childElements(root, 'extensions').forEach((group, groupIndex) => {
    childElements(group, 'extension').forEach((extension, index) => {
      const attrs = attributesOf(extension);
      if (attrs.supported !== SUPPORTED_API) {
        return;
      }
      const path = ['extensions', groupIndex, 'extension', index];
      const extAttrs = validateAttributes(ExtensionAttrsSchema, attrs, path, errors);

      const enumerators: ExtendingEnumerator[] = [];
      childElements(extension, 'require').forEach((requireBlock, requireIndex) => {
        enumerators.push(
          ...collectExtending(requireBlock, [...path, 'require', requireIndex], errors)
        );
      });

      if (extAttrs !== undefined) {
        extensions.push({ name: extAttrs.name, number: extAttrs.number, enumerators });
      }
    });
  });
  return extensions;
}

/**
 * Parse a registry XML string.
 */
export function parseRegistryXml(content: string, source = '<input>'): ParseResult {
  // Check well-formedness; XMLParser itself is lenient
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { line, col, msg } = validation.err;
    return {
      success: false,
      errors: [{ path: [], message: `XML parse error at ${line}:${col}: ${msg}` }],
    };
  }

  let data: unknown;
  try {
    data = createXmlParser().parse(content);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      success: false,
      errors: [{ path: [], message: `XML parse error: ${message}` }],
    };
  }

  const root = findRoot(data);
  if (root === undefined) {
    return {
      success: false,
      errors: [{ path: [], message: 'Document has no root element' }],
    };
  }

  const errors: ValidationError[] = [];
  const document: RegistryDocument = {
    source,
    enumBlocks: loadEnumBlocks(root, errors),
    featureEnumerators: loadFeatureEnumerators(root, errors),
    extensions: loadExtensions(root, errors),
  };

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, document };
}

function readFailure(filePath: string, e: unknown): string {
  if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
    return `Registry file not found: ${filePath}`;
  }
  return `Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`;
}

/**
 * Read and parse one registry file. I/O failures become parse errors.
 */
export function parseRegistryFile(filePath: string): ParseResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (e) {
    return { success: false, errors: [{ path: [], message: readFailure(filePath, e) }] };
  }
  return parseRegistryXml(content, filePath);
}

/**
 * Render errors one per line as `  - <path>: <message>`, the path left out
 * for document-level errors.
 */
export function formatErrors(errors: ValidationError[]): string {
  const lines: string[] = [];
  for (const { path, message } of errors) {
    lines.push(path.length === 0 ? `  - ${message}` : `  - ${path.join('.')}: ${message}`);
  }
  return lines.join('\n');
}

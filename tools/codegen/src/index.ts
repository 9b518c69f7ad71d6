/**
 * @vk-enum/codegen - Registry loading, model assembly and C generation.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { EnumGenError } from '@vk-enum/shared';
import { parseRegistryFile, formatErrors } from './parser.js';
import { assembleModel, type RegistryModel, type SkippedReference } from './assembler.js';
import { generateSource } from './generators/source.js';
import { generateHeader } from './generators/header.js';
import {
  DEFAULT_EMIT_OPTIONS,
  HEADER_FILENAME,
  SOURCE_FILENAME,
  type EmitOptions,
} from './generators/options.js';
import type { RegistryDocument } from './schema.js';

export { parseRegistryFile, parseRegistryXml, formatErrors, type ParseResult } from './parser.js';
export * from './assembler.js';
export { generateSource } from './generators/source.js';
export { generateHeader } from './generators/header.js';
export * from './generators/options.js';
export * from './schema.js';

/**
 * Options for code generation.
 */
export interface CodegenOptions {
  /** Registry XML files, processed in order. */
  xmlPaths: string[];
  /** Output directory for generated files. */
  outputDir: string;
  /** Generator options (defaults to DEFAULT_EMIT_OPTIONS). */
  emit?: EmitOptions;
}

/**
 * Result of code generation.
 */
export interface CodegenResult {
  success: boolean;
  errors: string[];
  /** Files that were written. */
  files: string[];
  /** Declarations skipped because the type they extend is not loaded. */
  skipped: SkippedReference[];
}

type LoadResult =
  | { success: true; documents: RegistryDocument[] }
  | { success: false; errors: string[] };

interface GeneratedFile {
  filePath: string;
  content: string;
}

const STAGING_SUFFIX = '.tmp';

function loadDocuments(xmlPaths: string[]): LoadResult {
  const documents: RegistryDocument[] = [];
  const errors: string[] = [];

  for (const xmlPath of xmlPaths) {
    const parseResult = parseRegistryFile(xmlPath);
    if (parseResult.success) {
      documents.push(parseResult.document);
    } else {
      errors.push(`Failed to parse ${xmlPath}:\n${formatErrors(parseResult.errors)}`);
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, documents };
}

function removeQuietly(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

/**
 * Write every file or none. Contents go to staging files first; the
 * targets are only replaced once all staging writes succeed, and targets
 * already replaced are removed again if a later rename fails.
 */
function writeAll(generated: GeneratedFile[]): string | undefined {
  const staged: string[] = [];
  for (const { filePath, content } of generated) {
    const stagingPath = filePath + STAGING_SUFFIX;
    try {
      fs.writeFileSync(stagingPath, content, 'utf-8');
      staged.push(stagingPath);
    } catch (e) {
      staged.forEach(removeQuietly);
      const message = e instanceof Error ? e.message : String(e);
      return `Failed to write ${filePath}: ${message}`;
    }
  }

  const replaced: string[] = [];
  for (const { filePath } of generated) {
    try {
      fs.renameSync(filePath + STAGING_SUFFIX, filePath);
      replaced.push(filePath);
    } catch (e) {
      replaced.forEach(removeQuietly);
      staged.forEach(removeQuietly);
      const message = e instanceof Error ? e.message : String(e);
      return `Failed to write ${filePath}: ${message}`;
    }
  }
  return undefined;
}

/**
 * Run code generation. Nothing is left in the output directory unless
 * every document loads, every declaration resolves and both files are
 * written.
 */
export function runCodegen(options: CodegenOptions): CodegenResult {
  if (options.xmlPaths.length === 0) {
    return { success: false, errors: ['No registry files given'], files: [], skipped: [] };
  }

  const loadResult = loadDocuments(options.xmlPaths);
  if (!loadResult.success) {
    return { success: false, errors: loadResult.errors, files: [], skipped: [] };
  }

  let model: RegistryModel;
  try {
    model = assembleModel(loadResult.documents);
  } catch (e) {
    if (e instanceof EnumGenError) {
      return {
        success: false,
        errors: [`Failed to resolve enumerators: [${e.code}] ${e.message}`],
        files: [],
        skipped: [],
      };
    }
    throw e;
  }

  const emit = options.emit ?? DEFAULT_EMIT_OPTIONS;
  const generated: GeneratedFile[] = [
    { filePath: path.join(options.outputDir, SOURCE_FILENAME), content: generateSource(model, emit) },
    { filePath: path.join(options.outputDir, HEADER_FILENAME), content: generateHeader(model, emit) },
  ];

  fs.mkdirSync(options.outputDir, { recursive: true });
  const writeError = writeAll(generated);
  if (writeError !== undefined) {
    return { success: false, errors: [writeError], files: [], skipped: model.skipped };
  }

  return {
    success: true,
    errors: [],
    files: generated.map((file) => file.filePath),
    skipped: model.skipped,
  };
}

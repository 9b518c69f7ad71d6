/**
 * vk-enum-to-str command definition.
 */

import { Command } from 'commander';
import * as path from 'node:path';
import { runCodegen, type CodegenResult } from '@vk-enum/codegen';

export type CliOptions = {
  xml: string[];
  outdir: string;
};

/**
 * Accumulate a repeatable option.
 */
function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Run code generation for parsed options and return the exit code.
 */
export function runGenerate(options: CliOptions): number {
  let result: CodegenResult;
  try {
    result = runCodegen({
      xmlPaths: options.xml.map((xml) => path.resolve(xml)),
      outputDir: path.resolve(options.outdir),
    });
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  if (result.skipped.length > 0) {
    console.warn(
      `Skipped ${result.skipped.length} declaration(s) extending enum types that are not loaded.`
    );
  }

  if (result.success) {
    console.log('Generated files:');
    for (const file of result.files) {
      console.log(`  - ${file}`);
    }
    return 0;
  }

  console.error('Code generation failed:');
  for (const error of result.errors) {
    console.error(`  ${error}`);
  }
  return 1;
}

/**
 * Build the command. `onExit` receives the exit code of a completed run.
 */
export function createProgram(onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('vk-enum-to-str')
    .description('Generate Vulkan enum-to-string functions from registry XML')
    .requiredOption('--xml <path>', 'Vulkan API registry XML file (repeatable)', collect)
    .requiredOption('--outdir <path>', 'Directory to put the generated files in')
    .action(() => {
      onExit(runGenerate(program.opts<CliOptions>()));
    });

  return program;
}

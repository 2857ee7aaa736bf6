/**
 * Command-line entry point
 *
 * Usage:
 *   model-rule-checker check --model <json> --rules <tsv> [options]
 *
 * Options:
 *   --minimum-severity <level>   Info|Warning|Error (default: Info)
 *   --hide-skipped               Do not report rules that matched no element
 *   --match-mode <mode>          strict|fuzzy|mixed (default: strict)
 *   --json                       Print annotations as JSON
 */

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import type { Element } from './core/types';
import { loadFunctionInputs } from './config';
import { ConfigurationError, errorMessage } from './errors';
import { InMemoryHostContext } from './host/memory-context';
import { runAutomation } from './host/automation';
import { FileRuleTableSource } from './io/rule-sheet';
import { createLogger } from './logger';

export interface CheckOptions {
  model: string;
  rules: string;
  minimumSeverity?: string;
  hideSkipped?: boolean;
  matchMode?: string;
  json?: boolean;
}

function isRecord(value: unknown): value is Element {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readModel(path: string): Promise<Element> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Model file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Run one check and print the outcome. Resolves to the process exit code.
 */
export async function executeCheck(options: CheckOptions): Promise<number> {
  const inputs = loadFunctionInputs({
    spreadsheetUrl: options.rules,
    minimumSeverity: options.minimumSeverity,
    hideSkipped: options.hideSkipped,
    propertyMatchMode: options.matchMode,
  });
  const log = createLogger('model-rule-checker', { level: inputs.logLevel, pretty: true });

  const context = new InMemoryHostContext(await readModel(options.model));
  await runAutomation(context, inputs, { source: new FileRuleTableSource(log), logger: log });

  if (options.json) {
    console.log(JSON.stringify({
      status: context.status,
      message: context.statusMessage,
      annotations: context.annotations,
    }, null, 2));
  } else {
    for (const annotation of context.annotations) {
      console.log(`${annotation.level.padEnd(7)} ${annotation.category}: ${annotation.message} [${annotation.elementIds.join(', ')}]`);
    }
    console.log(context.statusMessage ?? '');
  }

  return context.status === 'exception' ? 1 : 0;
}

export function createProgram(): Command {
  const program = new Command()
    .name('model-rule-checker')
    .description('Check model elements against a WHERE/AND/CHECK rule sheet');

  program
    .command('check')
    .description('Evaluate a rule sheet against a model file')
    .requiredOption('-m, --model <file>', 'Model JSON file')
    .requiredOption('-r, --rules <path>', 'Rule sheet path or file: URL (tab-separated)')
    .option('--minimum-severity <level>', 'Lowest severity to report: Info|Warning|Error')
    .option('--hide-skipped', 'Do not report rules that matched no element')
    .option('--match-mode <mode>', 'Property match mode: strict|fuzzy|mixed')
    .option('--json', 'Output as JSON')
    .action(async (options: CheckOptions) => {
      try {
        process.exitCode = await executeCheck(options);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}

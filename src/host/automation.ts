/**
 * Automation entry point - one checking run against a host context
 */

import type { Element, EvaluationResult, HostContext, RuleTableSource } from '../core/types';
import type { FunctionInputs } from '../config';
import { detectSchemaVersion } from '../core/property-resolver';
import { parseRuleTable } from '../core/rule-table';
import { createRuleEngine } from '../core/rule-evaluator';
import { reportResults } from '../core/result-reporter';
import { flattenModel } from './flatten';
import { logger as defaultLogger, type Logger } from '../logger';

export const RULES_FAILED_REASON = 'Failed to process rules';

export interface AutomationDeps {
  source: RuleTableSource;
  flatten?: (root: Element) => Element[];
  logger?: Logger;
}

export interface AutomationSummary {
  ruleCount: number;
  elementCount: number;
  schemaVersion: number;
  results: Map<string, EvaluationResult>;
}

/**
 * Receive the model, load the rules, evaluate and report every group.
 * Returns null when the run ended in exception.
 */
export async function runAutomation(
  context: HostContext,
  inputs: FunctionInputs,
  deps: AutomationDeps
): Promise<AutomationSummary | null> {
  const log = deps.logger ?? defaultLogger;
  const flatten = deps.flatten ?? flattenModel;

  const root = await context.receiveModel();
  const elements = flatten(root);
  const schemaVersion = detectSchemaVersion(root);
  log.info('Detected model schema version', { schemaVersion, elements: elements.length });

  const { table, messages: readMessages } = await deps.source.read(inputs.spreadsheetUrl);
  for (const message of readMessages) {
    log.info(message);
  }
  if (table === null) {
    context.markRunException(RULES_FAILED_REASON);
    return null;
  }

  const { groups, messages } = parseRuleTable(table, { logger: log });
  for (const message of messages) {
    log.info(message);
  }
  if (groups === null) {
    context.markRunException(RULES_FAILED_REASON);
    return null;
  }

  const engine = createRuleEngine(elements, { matchMode: inputs.propertyMatchMode, logger: log });
  const results = new Map<string, EvaluationResult>();

  for (const group of groups) {
    const result = engine.evaluate(group);
    results.set(group.ruleId, result);
    reportResults(
      context,
      result,
      group,
      { minimumSeverity: inputs.minimumSeverity, hideSkipped: inputs.hideSkipped },
      log
    );
  }

  context.markRunSuccess(
    `Successfully applied ${groups.length} rules to ${elements.length} version ${schemaVersion} objects.`
  );

  return { ruleCount: groups.length, elementCount: elements.length, schemaVersion, results };
}

/**
 * Result Reporter - turns evaluation partitions into host annotations
 */

import type {
  Element,
  EvaluationResult,
  HostContext,
  ReportOptions,
  ResultLevel,
  ResultMetadata,
  ResultStatus,
  RuleGroup,
  Severity,
} from './types';
import { SEVERITY_ORDER } from './types';
import { errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';

/** Placeholder id for annotations that concern no element */
export const SKIPPED_ELEMENT_ID = '0';

const LEVELS: Record<Severity, ResultLevel> = {
  Info: 'INFO',
  Warning: 'WARNING',
  Error: 'ERROR',
};

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  minimumSeverity: 'Info',
  hideSkipped: false,
};

export function elementIds(elements: readonly Element[]): string[] {
  return elements.map(element => String(element['id'] ?? ''));
}

export function severityAtLeast(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[minimum];
}

/**
 * Metadata for one annotation, or `{}` when it cannot be serialized
 */
export function buildMetadata(
  group: RuleGroup,
  status: ResultStatus,
  objectCount: number,
  log: Logger = defaultLogger
): ResultMetadata | Record<string, never> {
  const metadata: ResultMetadata = {
    rule_id: group.ruleId,
    status,
    severity: group.severity,
    message: group.message,
    object_count: objectCount,
  };

  try {
    JSON.stringify(metadata);
    return metadata;
  } catch (error) {
    log.warn('Metadata is not serializable', { ruleId: group.ruleId, error: errorMessage(error) });
    return {};
  }
}

/**
 * Attach the annotations for one evaluated rule group
 */
export function reportResults(
  context: HostContext,
  result: EvaluationResult,
  group: RuleGroup,
  options: ReportOptions = DEFAULT_REPORT_OPTIONS,
  log: Logger = defaultLogger
): void {
  const { minimumSeverity, hideSkipped } = options;
  const category = `Rule ${group.ruleId}`;

  if (result.outcome === 'skipped') {
    if (!hideSkipped) {
      context.attachInfo(
        `${category} Skipped`,
        [SKIPPED_ELEMENT_ID],
        `No objects found for rule ${group.ruleId}`,
        {}
      );
    }
    return;
  }

  if (result.passed.length > 0 && minimumSeverity === 'Info') {
    context.attachInfo(
      category,
      elementIds(result.passed),
      group.message,
      buildMetadata(group, 'PASS', result.passed.length, log)
    );
  }

  if (result.failed.length > 0 && severityAtLeast(group.severity, minimumSeverity)) {
    context.attachResult(
      category,
      elementIds(result.failed),
      group.message,
      LEVELS[group.severity],
      buildMetadata(group, 'FAIL', result.failed.length, log)
    );
  }
}

/**
 * In-memory host context
 *
 * Collects annotations and the run status instead of sending them to an
 * automation platform. Used by the CLI and in tests.
 */

import type { Element, HostContext, ResultLevel, ResultMetadata } from '../core/types';

export type RunStatus = 'running' | 'succeeded' | 'exception';

export interface Annotation {
  kind: 'info' | 'result';
  category: string;
  elementIds: string[];
  message: string;
  level: ResultLevel;
  metadata: ResultMetadata | Record<string, never>;
}

export class InMemoryHostContext implements HostContext {
  readonly annotations: Annotation[] = [];
  status: RunStatus = 'running';
  statusMessage: string | undefined;

  private readonly model: Element;

  constructor(model: Element) {
    this.model = model;
  }

  receiveModel(): Element {
    return this.model;
  }

  attachInfo(
    category: string,
    elementIds: string[],
    message: string,
    metadata: ResultMetadata | Record<string, never>
  ): void {
    this.annotations.push({ kind: 'info', category, elementIds, message, level: 'INFO', metadata });
  }

  attachResult(
    category: string,
    elementIds: string[],
    message: string,
    level: ResultLevel,
    metadata: ResultMetadata | Record<string, never>
  ): void {
    this.annotations.push({ kind: 'result', category, elementIds, message, level, metadata });
  }

  markRunSuccess(summary: string): void {
    this.status = 'succeeded';
    this.statusMessage = summary;
  }

  markRunException(reason: string): void {
    this.status = 'exception';
    this.statusMessage = reason;
  }
}

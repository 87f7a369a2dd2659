/**
 * errors.ts — Error taxonomy for the harvester.
 *
 * Two kinds matter to the orchestration layer:
 *   • fatal: the run cannot even begin (no activation control, bad config).
 *   • transient: a navigation timeout, a stale DOM node, a non-2xx export
 *                  response.  Retried by the governing policy and, once the
 *                  budget is spent, recorded as a per-item failure.
 */

export type FailureKind = 'fatal' | 'transient';

export class HarvesterError extends Error {
  readonly kind: FailureKind;

  constructor(message: string, kind: FailureKind) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

// ─── Fatal ─────────────────────────────────────────────────

export class FatalNavigationError extends HarvesterError {
  constructor(message: string) {
    super(message, 'fatal');
  }
}

export class ConfigError extends HarvesterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'fatal');
    this.issues = issues;
  }
}

/** An operation was called from a navigator state that does not allow it. */
export class NavigatorStateError extends HarvesterError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while the grid is ${state}`, 'fatal');
  }
}

// ─── Transient ─────────────────────────────────────────────

export class TransientNavigationError extends HarvesterError {
  constructor(message: string) {
    super(message, 'transient');
  }
}

/** An element reference was invalidated while it was being read. */
export class StaleElementError extends HarvesterError {
  constructor(message: string) {
    super(message, 'transient');
  }
}

export type ExportStage = 'form' | 'submit';

export class ExportHttpError extends HarvesterError {
  readonly statusCode: number;
  readonly stage: ExportStage;

  constructor(statusCode: number, stage: ExportStage, url: string) {
    super(`Export ${stage} request returned HTTP ${statusCode} for ${url}`, 'transient');
    this.statusCode = statusCode;
    this.stage = stage;
  }
}

/** The export POST succeeded but its body cannot be an export document. */
export class ExportContentError extends HarvesterError {
  constructor(message: string) {
    super(message, 'transient');
  }
}

// ─── Classification ────────────────────────────────────────

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

const TRANSIENT_MESSAGE_PATTERNS = [
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'detached',
  'execution context was destroyed',
  'target closed',
  'temporarily unavailable',
];

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof HarvesterError) {
    return error.kind;
  }

  const normalized = describeError(error).toLowerCase();
  if (TRANSIENT_MESSAGE_PATTERNS.some((pattern) => normalized.includes(pattern))) {
    return 'transient';
  }
  return 'fatal';
}

/** puppeteer reports a node swapped out from under a handle with these messages. */
export function isStaleElementMessage(message: string): boolean {
  const normalized = message.toLowerCase();
  return (
    normalized.includes('detached') ||
    normalized.includes('execution context was destroyed') ||
    normalized.includes('cannot find context with specified id')
  );
}

// ============================================================================
// PIPELINE ERROR TYPES
// ============================================================================
// Categorized errors. Fatal kinds are thrown as PipelineError subclasses;
// recoverable kinds (field, element, provider) are carried as values.

/**
 * Categories of pipeline errors with different handling strategies
 */
export enum ScrapeErrorType {
  /** Network-related errors (connection, DNS, etc.) */
  NETWORK = 'network',
  /** Timeout errors (navigation, provider call) */
  TIMEOUT = 'timeout',
  /** Navigation errors (page load, redirect issues) */
  NAVIGATION = 'navigation',
  /** Selector errors (element not found, invalid selector) */
  SELECTOR = 'selector',
  /** Extraction errors for a single element - skipped */
  EXTRACTION = 'extraction',
  /** Configuration errors (unknown target, missing credentials) */
  CONFIG = 'config',
  /** LLM provider errors - recovered by rule-based fallback */
  PROVIDER = 'provider',
  /** Persisted input file absent */
  INPUT_MISSING = 'input_missing',
  /** Run produced nothing to enrich */
  EMPTY_RESULT = 'empty_result',
  /** Unknown/unexpected errors */
  UNKNOWN = 'unknown',
}

/**
 * Structured error record for logs and run results
 */
export interface ScrapeError {
  type: ScrapeErrorType;
  message: string;
  /** Whether the pipeline can continue past this error */
  recoverable: boolean;
  cause?: Error;
  timestamp: number;
}

/**
 * Per-element extraction failure, recorded when an element is skipped
 */
export interface ItemExtractionError {
  /** 1-based position of the element among the matched containers */
  itemIndex: number;
  containerSelector: string;
  error: string;
}

const RECOVERABLE_TYPES: ReadonlySet<ScrapeErrorType> = new Set([
  ScrapeErrorType.SELECTOR,
  ScrapeErrorType.EXTRACTION,
  ScrapeErrorType.PROVIDER,
]);

export function isRecoverable(type: ScrapeErrorType): boolean {
  return RECOVERABLE_TYPES.has(type);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for errors that abort the pipeline
 */
export class PipelineError extends Error {
  readonly type: ScrapeErrorType;

  constructor(type: ScrapeErrorType, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.type = type;
  }

  toScrapeError(): ScrapeError {
    return createScrapeError(this, this.type);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(ScrapeErrorType.CONFIG, message, cause);
  }
}

export class NavigationError extends PipelineError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const type = classifyError(cause);
    super(
      type === ScrapeErrorType.UNKNOWN ? ScrapeErrorType.NAVIGATION : type,
      `Navigation to ${url} failed: ${errorMessage(cause)}`,
      cause
    );
    this.url = url;
  }
}

export class EmptyScrapeError extends PipelineError {
  constructor(message: string) {
    super(ScrapeErrorType.EMPTY_RESULT, message);
  }
}

export class PersistedInputMissingError extends PipelineError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(ScrapeErrorType.INPUT_MISSING, `Input file not found: ${path}`, cause);
    this.path = path;
  }
}

export class EnrichmentProviderError extends PipelineError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super(ScrapeErrorType.PROVIDER, `[${provider}] ${message}`, cause);
    this.provider = provider;
  }
}

/**
 * Create a ScrapeError from an unknown error
 */
export function createScrapeError(
  error: unknown,
  type: ScrapeErrorType = ScrapeErrorType.UNKNOWN
): ScrapeError {
  return {
    type,
    message: errorMessage(error),
    recoverable: isRecoverable(type),
    cause: error instanceof Error ? error : undefined,
    timestamp: Date.now(),
  };
}

/**
 * Classify an error into a ScrapeErrorType based on its message/type
 */
export function classifyError(error: unknown): ScrapeErrorType {
  if (error instanceof PipelineError) {
    return error.type;
  }

  const message = errorMessage(error).toLowerCase();

  // Timeouts first: Playwright reports "Timeout 60000ms exceeded" on goto
  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('exceeded')
  ) {
    return ScrapeErrorType.TIMEOUT;
  }

  if (
    message.includes('net::') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('network') ||
    message.includes('connection')
  ) {
    return ScrapeErrorType.NETWORK;
  }

  if (
    message.includes('navigation') ||
    message.includes('navigate') ||
    message.includes('page.goto')
  ) {
    return ScrapeErrorType.NAVIGATION;
  }

  if (
    message.includes('selector') ||
    message.includes('queryselector') ||
    message.includes('element not found')
  ) {
    return ScrapeErrorType.SELECTOR;
  }

  if (message.includes('extract') || message.includes('parse')) {
    return ScrapeErrorType.EXTRACTION;
  }

  return ScrapeErrorType.UNKNOWN;
}

/**
 * Create a ScrapeError with automatic classification
 */
export function wrapError(error: unknown): ScrapeError {
  return createScrapeError(error, classifyError(error));
}

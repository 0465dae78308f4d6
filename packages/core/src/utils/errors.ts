/**
 * @fileoverview Error utilities
 *
 * Error classes raised by the core, and classification of model client
 * failures into short messages safe to show a user.
 */

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Raised when a tool name is registered twice
 */
export class DuplicateToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}

/**
 * Raised when the settings file or environment overrides fail validation
 */
export class SettingsValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid settings in ${source}: ${issues.join('; ')}`);
    this.name = 'SettingsValidationError';
    this.issues = issues;
  }
}

// =============================================================================
// Error Classification
// =============================================================================

export type ErrorCategory = 'authentication' | 'rate_limit' | 'network' | 'server' | 'unknown';

export interface ParsedError {
  category: ErrorCategory;
  /** Constructor name, e.g. "RateLimitError" */
  name: string;
  /** First line of the error message */
  message: string;
  status?: number;
}

interface ErrorPattern {
  pattern: RegExp;
  category: Exclude<ErrorCategory, 'unknown'>;
}

// Matched against "<name> <message>"
const ERROR_PATTERNS: ErrorPattern[] = [
  { pattern: /AuthenticationError|PermissionDenied|invalid.*api.?key|authentication_error/i, category: 'authentication' },
  { pattern: /RateLimitError|rate.?limit|too.?many.?requests/i, category: 'rate_limit' },
  { pattern: /APIConnectionError|APITimeoutError|ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|fetch failed/i, category: 'network' },
  { pattern: /InternalServerError|overloaded/i, category: 'server' },
];

function extractStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function categoryForStatus(status: number | undefined): ErrorCategory | undefined {
  if (status === undefined) return undefined;
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server';
  return undefined;
}

function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name || error.constructor.name, message: error.message };
  }
  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Classify an error thrown by a model client
 */
export function parseError(error: unknown): ParsedError {
  const { name, message } = describeError(error);
  const status = extractStatus(error);
  const firstLine = message.split('\n')[0]?.trim() || name;

  const haystack = `${name} ${message}`;
  const category =
    ERROR_PATTERNS.find((entry) => entry.pattern.test(haystack))?.category ??
    categoryForStatus(status) ??
    'unknown';

  return {
    category,
    name,
    message: firstLine,
    status,
  };
}

/**
 * One-line message for the user when a model call fails
 */
export function formatModelError(error: unknown): string {
  const parsed = parseError(error);
  switch (parsed.category) {
    case 'authentication':
      return 'Error: invalid API key. Check the model.apiKey setting or BURROW_API_KEY.';
    case 'rate_limit':
      return 'Error: rate limit reached. Try again in a moment.';
    case 'network':
      return 'Error: could not reach the API. Check your internet connection and the model.apiBase setting.';
    default:
      return `Error (${parsed.name}): ${parsed.message}`;
  }
}

/**
 * Message of an unknown thrown value, for logs and tool results
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

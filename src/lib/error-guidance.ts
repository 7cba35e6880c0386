/**
 * Error guidance pattern matching for platform client failures
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage, getStatusCode } from './errors';

/**
 * Pattern definition for matching errors and generating guidance
 */
export interface ErrorPattern {
  /** Test if this pattern matches the given error */
  match: (error: unknown) => boolean;
  /** Generate guidance for a matched error */
  guidance: (error: unknown) => ErrorGuidance;
}

/**
 * Create error guidance builder with pattern matching
 *
 * Patterns are tried in order; the first match wins.
 *
 * @example
 * ```typescript
 * const extractGuidance = createErrorGuidanceBuilder([
 *   statusCodePattern(404, {
 *     message: 'Pod not found',
 *     hint: 'The pod was deleted or never existed',
 *     resolution: 'Check the pod name and namespace',
 *   }),
 * ]);
 * const guidance = extractGuidance(error);
 * ```
 */
export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  defaultGuidance?: (error: unknown) => ErrorGuidance,
): (error: unknown) => ErrorGuidance {
  return function extractGuidance(error: unknown): ErrorGuidance {
    for (const pattern of patterns) {
      if (pattern.match(error)) {
        return pattern.guidance(error);
      }
    }

    if (defaultGuidance) {
      return defaultGuidance(error);
    }

    return {
      message: extractErrorMessage(error),
      hint: 'An unexpected error occurred',
      resolution: 'Check the error message and logs for more details',
    };
  };
}

/**
 * Match error message substrings (case-insensitive)
 */
export function messagePattern(substring: string, guidance: ErrorGuidance): ErrorPattern {
  const needle = substring.toLowerCase();
  return {
    match: (error: unknown) => extractErrorMessage(error).toLowerCase().includes(needle),
    guidance: () => guidance,
  };
}

/**
 * Match the HTTP status code carried by dockerode and Kubernetes client errors
 */
export function statusCodePattern(statusCode: number, guidance: ErrorGuidance): ErrorPattern {
  return {
    match: (error: unknown) => getStatusCode(error) === statusCode,
    guidance: () => ({ ...guidance, details: { ...guidance.details, statusCode } }),
  };
}

/**
 * Create pattern with custom match function
 */
export function customPattern(
  matchFn: (error: unknown) => boolean,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return {
    match: matchFn,
    guidance: typeof guidance === 'function' ? guidance : () => guidance,
  };
}

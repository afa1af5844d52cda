/**
 * User-facing rendering of request failures.
 */

import { ConfigValidationError } from '@/models/config';
import { AuthConfigError } from '@/auth/factory';
import { isNetworkError, type NetworkError } from './error-types';

const BODY_EXCERPT_LENGTH = 500;

/**
 * Render a network error as a few lines of plain text: what failed, the
 * response body if there was one, and the most relevant suggestion.
 */
export function formatNetworkError(error: NetworkError): string {
  const lines: string[] = [];
  const { context } = error;

  const target = context?.method && context.url ? ` (${context.method} ${context.url})` : '';
  lines.push(`${getUserFriendlyMessage(error)}${target}`);

  if (context?.attempt !== undefined && context.attempt > 0) {
    lines.push(`Failed after ${context.attempt + 1} attempts`);
  }

  const body = error.getBody();
  if (body) {
    const excerpt = body.length > BODY_EXCERPT_LENGTH ? `${body.slice(0, BODY_EXCERPT_LENGTH)}…` : body;
    lines.push(`Response body: ${excerpt}`);
  }

  const suggestion = error.getPrimarySuggestion();
  if (suggestion) {
    lines.push(`Suggestion: ${suggestion.description}`);
  }

  return lines.join('\n');
}

/**
 * Render anything thrown out of a request call
 */
export function formatError(error: unknown): string {
  if (isNetworkError(error)) {
    return formatNetworkError(error);
  }
  if (error instanceof ConfigValidationError || error instanceof AuthConfigError) {
    return `Configuration error: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function getUserFriendlyMessage(error: NetworkError): string {
  switch (error.kind) {
    case 'client':
    case 'server':
      return `Request failed with HTTP ${error.getStatusCode()}`;
    case 'timeout':
      return `Request timed out: ${error.message}`;
    case 'cancelled':
      return 'Request was cancelled';
    case 'unknown':
      return `Request failed: ${error.message}`;
  }
}

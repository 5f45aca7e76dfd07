/**
 * Error presentation layer for surfacing compatibility errors to users.
 *
 * A project that declares an unsupported version needs to be told which
 * version to declare instead; a defect in the declared ladder needs to be
 * reported to the tool's maintainers, not the project author. This module
 * maps TypedError codes to user-facing presentations carrying that
 * distinction.
 */

import { TypedError } from './errors';

/** Severity levels for error presentation. */
export type ErrorSeverity = 'info' | 'warning' | 'error';

/** Who is expected to act on the error. */
export type ErrorAudience = 'project-author' | 'tool-maintainer';

/** User-facing error presentation. */
export interface ErrorPresentation {
  severity: ErrorSeverity;
  /** Short, user-friendly error title. */
  title: string;
  /** User-facing explanation of what went wrong. */
  userMessage: string;
  /** Technical details for verbose output. */
  technicalDetails: string;
  audience: ErrorAudience;
  /** Suggested actions (e.g., "Declare version 5.0.0 or newer"). */
  suggestedActions: string[];
  /** Original TypedError code for programmatic handling. */
  errorCode: string;
}

/**
 * Rule for mapping a TypedError code pattern to a presentation.
 *
 * Code patterns use prefix matching: 'CHAIN' matches
 * 'CHAIN.NON_MONOTONIC_VERSION', 'CHAIN.EMPTY', etc.
 */
export interface ErrorPresentationRule {
  /** Error code prefix to match against. */
  codePrefix: string;
  severity: ErrorSeverity;
  /** Template for the user-facing title. May use {code}. */
  titleTemplate: string;
  /** Template for the user-facing message. May use {message}, {requested}, {minimum}, {toolVersion}. */
  messageTemplate: string;
  audience: ErrorAudience;
  /** Static suggested actions for this error class. */
  suggestedActions: string[];
}

/** Built-in error presentation rules, ordered from most specific to least. */
export const DEFAULT_ERROR_PRESENTATION_RULES: ErrorPresentationRule[] = [
  {
    codePrefix: 'RESOLVE.UNSUPPORTED_VERSION',
    severity: 'warning',
    titleTemplate: 'Unsupported Declared Version',
    messageTemplate:
      'The project declares version {requested}, but the oldest supported version is {minimum}.',
    audience: 'project-author',
    suggestedActions: ['Update the declared minimum version in the project metadata'],
  },
  {
    codePrefix: 'RESOLVE.VERSION_TOO_NEW',
    severity: 'warning',
    titleTemplate: 'Build Tool Too Old',
    messageTemplate:
      'The project declares version {requested}, but the running build tool is {toolVersion}.',
    audience: 'project-author',
    suggestedActions: ['Upgrade the build tool'],
  },
  {
    codePrefix: 'VERSION.MALFORMED',
    severity: 'error',
    titleTemplate: 'Malformed Version',
    messageTemplate: '{message}',
    audience: 'project-author',
    suggestedActions: ['Check the version string in the project metadata'],
  },
  {
    codePrefix: 'CHAIN',
    severity: 'error',
    titleTemplate: 'Compatibility Ladder Defect',
    messageTemplate: 'The build tool ships a broken compatibility ladder: {message}',
    audience: 'tool-maintainer',
    suggestedActions: ['Report this to the build tool maintainers'],
  },
];

/**
 * Present a TypedError as a user-facing ErrorPresentation.
 *
 * Matches the error code against the rules (first match wins),
 * interpolates template variables, and appends the error's own fixes.
 */
export function presentError(
  error: TypedError,
  rules: ErrorPresentationRule[] = DEFAULT_ERROR_PRESENTATION_RULES,
): ErrorPresentation {
  const fixActions = error.suggestedFixes.map((f) => f.description ?? `Apply fix: ${f.type}`);
  const rule = rules.find((r) => error.code.startsWith(r.codePrefix));

  if (rule) {
    return {
      severity: rule.severity,
      title: interpolate(rule.titleTemplate, error),
      userMessage: interpolate(rule.messageTemplate, error),
      technicalDetails: formatTechnicalDetails(error),
      audience: rule.audience,
      suggestedActions: [...rule.suggestedActions, ...fixActions],
      errorCode: error.code,
    };
  }

  // Fallback for unmatched error codes
  return {
    severity: 'error',
    title: 'Error',
    userMessage: error.message,
    technicalDetails: formatTechnicalDetails(error),
    audience: 'tool-maintainer',
    suggestedActions: fixActions,
    errorCode: error.code,
  };
}

function detail(error: TypedError, key: string): string {
  const value = error.details?.[key];
  return value === undefined ? 'unknown' : String(value);
}

/** Interpolate template variables like {message}, {requested}. */
function interpolate(template: string, error: TypedError): string {
  return template
    .replace(/\{message\}/g, error.message)
    .replace(/\{code\}/g, error.code)
    .replace(/\{requested\}/g, detail(error, 'requested'))
    .replace(/\{minimum\}/g, detail(error, 'minimum'))
    .replace(/\{toolVersion\}/g, detail(error, 'toolVersion'));
}

function formatTechnicalDetails(error: TypedError): string {
  const parts: string[] = [`Code: ${error.code}`, `Message: ${error.message}`];
  if (error.details) {
    parts.push(`Details: ${JSON.stringify(error.details)}`);
  }
  if (error.suggestedFixes.length > 0) {
    parts.push(`Fixes: ${error.suggestedFixes.map((f) => f.type).join(', ')}`);
  }
  return parts.join('\n');
}

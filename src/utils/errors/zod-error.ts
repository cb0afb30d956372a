import { ZodError, ZodIssue } from 'zod';

export interface ZodValidationIssue {
  field: string;
  message: string;
  code: string;
  details?: unknown;
}

const getIssueDetails = (issue: ZodIssue): unknown => {
  switch (issue.code) {
    case 'invalid_type':
      return {
        expected: issue.expected,
        received: issue.received
      };
    case 'invalid_string':
      return {
        validation: issue.validation
      };
    case 'invalid_enum_value':
      return {
        options: issue.options
      };
    default:
      return undefined;
  }
};

export const formatZodError = (error: ZodError): ZodValidationIssue[] => {
  return error.errors.map(issue => ({
    field: issue.path.join('.') || 'unknown',
    message: issue.message,
    code: issue.code,
    details: getIssueDetails(issue)
  }));
};

/**
 * Single-line summary such as `DB_PASSWORD: Required, DB_PORT: Expected number`.
 */
export const summarizeZodError = (error: ZodError): string => {
  return formatZodError(error)
    .map(issue => `${issue.field}: ${issue.message}`)
    .join(', ');
};

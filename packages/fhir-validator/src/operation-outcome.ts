import type { IssueSeverity, IssueType, ValidationMessage } from './types';

export interface OperationOutcomeIssue {
  severity: 'fatal' | 'error' | 'warning' | 'information';
  code: IssueType;
  diagnostics: string;
  expression?: string[];
  location?: string[];
}

export interface OperationOutcome {
  resourceType: 'OperationOutcome';
  issue: OperationOutcomeIssue[];
}

const SEVERITY: Record<IssueSeverity, OperationOutcomeIssue['severity']> = {
  FATAL: 'fatal',
  ERROR: 'error',
  WARNING: 'warning',
  INFORMATION: 'information',
};

/**
 * FHIR OperationOutcome for a set of messages. An empty set yields a single
 * informational issue, since an OperationOutcome needs at least one.
 */
export function toOperationOutcome(messages: ValidationMessage[]): OperationOutcome {
  if (messages.length === 0) {
    return {
      resourceType: 'OperationOutcome',
      issue: [{ severity: 'information', code: 'informational', diagnostics: 'No issues detected during validation' }],
    };
  }

  return {
    resourceType: 'OperationOutcome',
    issue: messages.map((message) => {
      const issue: OperationOutcomeIssue = {
        severity: SEVERITY[message.severity],
        code: message.type,
        diagnostics: message.message,
        expression: [message.location],
      };
      if (message.line !== undefined && message.column !== undefined) {
        issue.location = [`Line[${message.line}] Col[${message.column}]`];
      }
      return issue;
    }),
  };
}

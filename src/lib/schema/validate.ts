import Ajv from 'ajv/dist/2020';
import addFormats from 'ajv-formats';

import reconciliationReportV1Schema from './reconciliation-report-v1.schema.json';

import type { ErrorObject } from 'ajv';

export type ReportIssue = { path: string; message: string };

export type ValidationResult = { ok: true } | { ok: false; issues: ReportIssue[] };

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateReport = ajv.compile(reconciliationReportV1Schema);

// `required` errors point at the parent object; report the missing property instead.
function issuePath(err: ErrorObject): string {
  const missing: unknown = err.keyword === 'required' ? err.params.missingProperty : undefined;
  const path = typeof missing === 'string' ? `${err.instancePath}/${missing}` : err.instancePath;
  return path || '/';
}

export function validateReconciliationReportV1(input: unknown): ValidationResult {
  if (validateReport(input)) return { ok: true };
  const issues = (validateReport.errors ?? []).map((err) => ({ path: issuePath(err), message: err.message ?? 'invalid' }));
  return { ok: false, issues };
}

export function formatReportIssues(issues: readonly ReportIssue[]): string[] {
  return issues.map((issue) => `${issue.path}: ${issue.message}`);
}

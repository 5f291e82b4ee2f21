import { getNotDeployed, getOfflineAgents, getShadowIt, getSuspendedAgents } from '@/lib/reconcile/filters';
import { extractUniqueLabels, extractUniqueValues } from '@/lib/reconcile/labels';

import type { AppError } from '@/lib/errors/error';
import type { ReconcileResult, ReconciliationStats, ServerInput, WorkloadInput } from '@/lib/reconcile/types';

export const RECONCILIATION_REPORT_V1_VERSION = 'reconciliation-report-v1' as const;

export type ReportWorkload = WorkloadInput & { labels?: Readonly<Record<string, string>> };

export type ReportInput = {
  generatedAt: Date;
  workloads: readonly ReportWorkload[];
  /** `null` when the CMDB was unavailable for this run. */
  servers: readonly ServerInput[] | null;
  result: ReconcileResult;
  errors: readonly AppError[];
};

export type ReportArtifacts = {
  extractsDir: string;
  reportsDir: string;
  files: string[];
};

/** Receives the finished reconciliation. Implementations may throw; the run records the failure and carries on. */
export type ReportSink = {
  write: (input: ReportInput) => Promise<ReportArtifacts>;
};

export type ReconciliationReportV1 = {
  version: typeof RECONCILIATION_REPORT_V1_VERSION;
  generated_at: string;
  mode: ReconciliationStats['mode'];
  cmdb_available: boolean;
  stats: ReconciliationStats;
  labels: Record<string, string[]>;
  cmdb_values: { environment: string[]; application: string[]; operating_entity: string[] };
  findings: { not_deployed: number; shadow_it: number; offline_agents: number; suspended_agents: number };
  errors: AppError[];
};

export function buildReportDocument(input: ReportInput): ReconciliationReportV1 {
  const { records, stats } = input.result;
  const servers = input.servers ?? [];
  return {
    version: RECONCILIATION_REPORT_V1_VERSION,
    generated_at: input.generatedAt.toISOString(),
    mode: stats.mode,
    cmdb_available: input.servers !== null,
    stats,
    labels: extractUniqueLabels(input.workloads),
    cmdb_values: {
      environment: extractUniqueValues(servers, 'environment'),
      application: extractUniqueValues(servers, 'application'),
      operating_entity: extractUniqueValues(servers, 'operating_entity'),
    },
    findings: {
      not_deployed: getNotDeployed(records).length,
      shadow_it: getShadowIt(records).length,
      offline_agents: getOfflineAgents(records).length,
      suspended_agents: getSuspendedAgents(records).length,
    },
    errors: [...input.errors],
  };
}

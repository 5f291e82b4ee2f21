import type { WorkloadInput } from './types';

type LabelledWorkload = Pick<WorkloadInput, 'label_role' | 'label_app' | 'label_env' | 'label_loc'> & {
  labels?: Readonly<Record<string, string>>;
};

/** Label key → sorted distinct values seen across workloads. */
export function extractUniqueLabels(workloads: readonly LabelledWorkload[]): Record<string, string[]> {
  const seen = new Map<string, Set<string>>();
  const add = (key: string, value: string) => {
    if (!value) return;
    let values = seen.get(key);
    if (!values) {
      values = new Set();
      seen.set(key, values);
    }
    values.add(value);
  };

  for (const w of workloads) {
    add('role', w.label_role);
    add('app', w.label_app);
    add('env', w.label_env);
    add('loc', w.label_loc);
    for (const [key, value] of Object.entries(w.labels ?? {})) add(key, value);
  }

  return Object.fromEntries(
    [...seen].sort(([a], [b]) => a.localeCompare(b)).map(([key, values]) => [key, [...values].sort()]),
  );
}

/** Sorted distinct non-empty values of one field. */
export function extractUniqueValues<T extends object, K extends keyof T>(rows: readonly T[], field: K): string[] {
  const values = new Set<string>();
  for (const row of rows) {
    const value = row[field];
    if (value === null || value === undefined || value === '') continue;
    values.add(String(value));
  }
  return [...values].sort();
}

export type HostnameCase = 'upper' | 'lower';

/**
 * Join key shared by both sources: first DNS label only, letters/digits/`_`/`-` kept,
 * then case-folded. Empty input stays empty and never matches.
 */
export function normalizeHostname(value: unknown, fold: HostnameCase = 'upper'): string {
  if (typeof value !== 'string') return '';
  const firstLabel = value.trim().split('.')[0] ?? '';
  const cleaned = firstLabel.replace(/[^\p{L}\p{N}_-]/gu, '');
  return fold === 'upper' ? cleaned.toUpperCase() : cleaned.toLowerCase();
}

/** First address of a comma-separated list. */
export function normalizeIp(value: unknown): string {
  if (typeof value !== 'string') return '';
  return (value.split(',')[0] ?? '').trim();
}

/**
 * Encoded query matching the operating entity across the three fields instances use for it.
 * Returns null when no filter is configured.
 */
export function buildOperatingEntityQuery(filter: string | undefined): string | null {
  const value = filter?.trim();
  if (!value) return null;
  const safe = value.replace(/'/g, "\\'");
  return `u_operating_entityLIKE${safe}^ORoperating_entityLIKE${safe}^ORcompanyLIKE${safe}`;
}

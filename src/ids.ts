/**
 * PMC identifier normalization.
 */

/** Strip "PMC" prefix from a PMCID, returning just the numeric part */
export function normalizePmcid(pmcid: string): string {
  return pmcid.trim().replace(/^PMC/i, "");
}

/** Ensure a PMCID carries the "PMC" prefix, for filenames and display */
export function toDisplayPmcid(pmcid: string): string {
  return `PMC${normalizePmcid(pmcid)}`;
}

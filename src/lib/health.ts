/**
 * Health Calculator
 *
 * Review completeness of a vault: the share of reviewed changes among
 * everything awaiting or past review. Snoozed items are excluded.
 */

export interface VaultCounts {
  inbox: number
  snoozed: number
  active: number
  ignored: number
}

export interface VaultStats extends VaultCounts {
  library: number
  health: number
}

/**
 * `library / (library + inbox) * 100`, or 100 when both are zero
 */
export function calculateHealth(libraryCount: number, inboxCount: number): number {
  const total = libraryCount + inboxCount
  if (total <= 0) {
    return 100
  }
  return (libraryCount / total) * 100
}

export function calculateStats(counts: VaultCounts): VaultStats {
  return {
    ...counts,
    library: counts.active + counts.ignored,
    health: calculateHealth(counts.active, counts.inbox)
  }
}

/**
 * Whole-number percentage for display
 */
export function formatHealth(health: number): string {
  return `${Math.round(health)}%`
}

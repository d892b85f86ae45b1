import { createLookup } from "./lookup";

/**
 * Hour totals of a journal, as reported by the Tahvel API.
 * A capacity is a lesson kind such as contact or independent work.
 */
export interface CapacityHours {
  capacity: string;
  plannedHours: number;
  usedHours: number;
}

export interface JournalDetails {
  totalPlannedHours: number;
  capacityHours: CapacityHours[];
}

export interface CapacitySummary {
  plannedHours: number;
  usedHours: number;
  remainingHours: number;
}

export interface JournalHoursSummary {
  totalPlannedHours: number;
  capacities: string[]; // sorted capacity codes
  byCapacity: Record<string, CapacitySummary>;
}

/**
 * Combine the hours reported per capacity. A capacity listed more than once is summed.
 */
export function summarizeCapacities(details: JournalDetails): JournalHoursSummary {
  const byCapacity = createLookup<CapacitySummary>();

  for (const { capacity, plannedHours, usedHours } of details.capacityHours) {
    const current = byCapacity[capacity] ?? { plannedHours: 0, usedHours: 0, remainingHours: 0 };
    current.plannedHours += plannedHours;
    current.usedHours += usedHours;
    current.remainingHours = Math.max(current.plannedHours - current.usedHours, 0);
    byCapacity[capacity] = current;
  }

  return {
    totalPlannedHours: details.totalPlannedHours,
    capacities: Object.keys(byCapacity).sort(),
    byCapacity,
  };
}

import type { SchedulingPolicy } from "./config.js";
import { ScheduleConflictError } from "./errors.js";

export interface Interval {
  start: number;
  end: number;
}

/** Half-open intervals: touching end-to-start does not overlap. */
export function overlaps(a: Interval, b: Interval): boolean {
  return !(a.end <= b.start || b.end <= a.start);
}

export interface Placement {
  interval: Interval;
  attempts: number;
  /** True when the slot was accepted despite overlapping. */
  conflicted: boolean;
}

/**
 * Intervals booked per room. Placement is best-effort: a room that has no free
 * slot among the proposals either takes the last proposal anyway or fails,
 * depending on the policy.
 */
export class RoomSchedule {
  private readonly booked = new Map<string, Interval[]>();

  constructor(private readonly policy: SchedulingPolicy) {}

  intervals(roomId: string): readonly Interval[] {
    return this.booked.get(roomId) ?? [];
  }

  place(roomId: string, propose: () => Interval): Placement {
    let existing = this.booked.get(roomId);
    if (!existing) {
      existing = [];
      this.booked.set(roomId, existing);
    }

    const cap = Math.max(1, this.policy.slotAttempts);
    let candidate = propose();
    let attempts = 1;
    let free = existing.every((b) => !overlaps(candidate, b));
    while (!free && attempts < cap) {
      candidate = propose();
      attempts++;
      free = existing.every((b) => !overlaps(candidate, b));
    }

    if (!free && this.policy.onConflict === "fail") {
      throw new ScheduleConflictError(roomId, attempts);
    }
    existing.push(candidate);
    return { interval: candidate, attempts, conflicted: !free };
  }
}

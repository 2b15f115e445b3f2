import { DAY_TUNING } from "./constants";

export function advanceTimeOfDay(timeOfDay: number, dt: number): number {
  const next = timeOfDay + dt / DAY_TUNING.dayLengthSeconds;
  // Wraps to the start of the day rather than carrying the overshoot.
  return next >= 1 ? 0 : next;
}

/**
 * Overlay darkness for the presentation layer (0 = full day). Has no effect
 * on growth.
 */
export function darkness01(timeOfDay: number): number {
  const d = DAY_TUNING;
  if (timeOfDay <= d.nightEnd || timeOfDay >= d.nightStart) return d.nightDarkness;
  if (timeOfDay <= d.dawnEnd) {
    const progress = (timeOfDay - d.nightEnd) / (d.dawnEnd - d.nightEnd);
    return d.nightDarkness - progress * d.nightDarkness;
  }
  if (timeOfDay >= d.duskStart) {
    const progress = 1 - (timeOfDay - d.duskStart) / (d.nightStart - d.duskStart);
    return d.nightDarkness - progress * d.nightDarkness;
  }
  return 0;
}

export function isNight(timeOfDay: number): boolean {
  return timeOfDay <= DAY_TUNING.nightEnd || timeOfDay >= DAY_TUNING.nightStart;
}

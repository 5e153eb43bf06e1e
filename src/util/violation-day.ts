import { DateTime } from "luxon";

const DAY_FORMAT = "yyyy-MM-dd";

/**
 * Calendar date (process-local zone) of the violation day containing `nowMs`.
 * A violation day starts at `resetHour`, so 03:00 with a reset hour of 4 still
 * belongs to the previous calendar date.
 */
export function violationDay(nowMs: number, resetHour: number): string {
  let dt = DateTime.fromMillis(nowMs);
  if (dt.hour < resetHour) dt = dt.minus({ days: 1 });
  return dt.toFormat(DAY_FORMAT);
}

/** Oldest violation day still retained; rows dated before it may be purged. */
export function retentionCutoff(nowMs: number, resetHour: number, retentionDays: number): string {
  return DateTime.fromFormat(violationDay(nowMs, resetHour), DAY_FORMAT)
    .minus({ days: retentionDays })
    .toFormat(DAY_FORMAT);
}

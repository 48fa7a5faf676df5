/**
 * Last second of the calendar day `now` falls on, in the process's local
 * time zone (set TZ to pin the deployment's reference zone).
 */
export function endOfDay(now: Date): Date {
  const end = new Date(now.getTime());
  end.setHours(23, 59, 59, 0);
  return end;
}

export function isPast(instant: Date, now: Date): boolean {
  return now.getTime() > instant.getTime();
}

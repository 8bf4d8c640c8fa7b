const MINUTES_PER_HOUR = 60;
const MINUTES_PER_DAY = 1440;
const MINUTES_PER_MONTH = 43800;
// Past this (about 363 days) a calendar date reads better than "N months ago".
const MAX_RELATIVE_MINUTES = 523440;

function distanceOfTime(minutes: number): string {
  if (minutes < 1) {
    return `${String(Math.floor(minutes * 60))} secs`;
  }
  if (minutes < 59) {
    return `${String(Math.floor(minutes))} minutes`;
  }
  if (minutes < MINUTES_PER_DAY) {
    return `${String(Math.floor(minutes / MINUTES_PER_HOUR))} hours`;
  }
  if (minutes < 2 * MINUTES_PER_DAY) {
    return '1 day';
  }
  if (minutes < MINUTES_PER_MONTH) {
    return `${String(Math.floor(minutes / MINUTES_PER_DAY))} days`;
  }
  if (minutes < 2 * MINUTES_PER_MONTH) {
    return '1 month';
  }
  return `${String(Math.floor(minutes / MINUTES_PER_MONTH))} months`;
}

export function timeAgo(date: Date, now: Date = new Date()): string {
  const deltaMinutes = Math.max(0, (now.getTime() - date.getTime()) / 60000);
  if (deltaMinutes <= MAX_RELATIVE_MINUTES) {
    return `${distanceOfTime(deltaMinutes)} ago`;
  }
  return date.toLocaleDateString('en-GB', { day: 'numeric', month: 'short', timeZone: 'UTC' });
}

import { format } from 'date-fns';

/** `YYYY-MM-DD_HH-MM-SS` in local time, safe for file and folder names. */
export function fileTimestamp(date: Date = new Date()): string {
  return format(date, 'yyyy-MM-dd_HH-mm-ss');
}

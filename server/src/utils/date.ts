import { DateTime } from "luxon";

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const PERIOD_REGEX = /^\d{4}-(0[1-9]|1[0-2])$/;

export const nowISO = () => new Date().toISOString();

export const todayISODate = () => DateTime.utc().toFormat("yyyy-MM-dd");

export function parseISODate(value: string): DateTime | null {
  if (!ISO_DATE_REGEX.test(value)) {
    return null;
  }
  const parsed = DateTime.fromISO(value, { zone: "utc" });
  return parsed.isValid ? parsed : null;
}

export const isISODate = (value: string) => parseISODate(value) !== null;

export const isPeriod = (value: string) => PERIOD_REGEX.test(value);

/** Negative when `a` is earlier. Both values must be ISO dates. */
export function compareISODates(a: string, b: string): number {
  return a.localeCompare(b);
}

export function daysBetween(from: string, to: string): number {
  const start = parseISODate(from);
  const end = parseISODate(to);
  if (!start || !end) {
    throw new Error(`Invalid date range: ${from}..${to}`);
  }
  return end.diff(start, "days").days;
}

export function isDateWithinRange(date: string, from?: string, to?: string): boolean {
  if (from && compareISODates(date, from) < 0) {
    return false;
  }
  if (to && compareISODates(date, to) > 0) {
    return false;
  }
  return true;
}

/** A `YYYY-MM` period overlaps the range when any day of that month falls inside it. */
export function isPeriodWithinRange(period: string, from?: string, to?: string): boolean {
  const start = DateTime.fromISO(`${period}-01`, { zone: "utc" });
  if (!start.isValid) {
    return false;
  }
  const firstDay = start.toISODate() ?? "";
  const lastDay = start.endOf("month").toISODate() ?? "";
  if (from && compareISODates(lastDay, from) < 0) {
    return false;
  }
  if (to && compareISODates(firstDay, to) > 0) {
    return false;
  }
  return true;
}

export function formatReportPeriod(asOf: string): string {
  const parsed = parseISODate(asOf);
  if (!parsed) {
    throw new Error(`Invalid report date: ${asOf}`);
  }
  return parsed.setLocale("en-US").toFormat("LLLL yyyy");
}

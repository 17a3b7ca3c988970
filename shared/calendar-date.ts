import { addDays, format, isValid, parse } from "date-fns";

/**
 * Business dates travel through the store as "dd/MM/yyyy" strings with no time
 * component. Inside the service they are CalendarDate values so comparisons
 * and arithmetic never touch the string form.
 */
export const STORE_DATE_FORMAT = "dd/MM/yyyy";

const STORE_DATE_PATTERN = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

export class CalendarDate {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {}

  /**
   * Build from calendar components (month is 1-based). Returns null for
   * impossible dates such as 31/02.
   */
  static of(year: number, month: number, day: number): CalendarDate | null {
    const candidate = new Date(year, month - 1, day);
    if (
      candidate.getFullYear() !== year ||
      candidate.getMonth() !== month - 1 ||
      candidate.getDate() !== day
    ) {
      return null;
    }
    return new CalendarDate(year, month, day);
  }

  /** Truncate a timestamp to its local calendar day. */
  static fromDate(date: Date): CalendarDate {
    return new CalendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
  }

  /** Parse the store format. Anything else yields null. */
  static parse(value: string | null | undefined): CalendarDate | null {
    if (!value) return null;
    const trimmed = value.trim();
    if (!STORE_DATE_PATTERN.test(trimmed)) return null;

    const parsed = parse(trimmed, STORE_DATE_FORMAT, new Date(2000, 0, 1));
    if (!isValid(parsed)) return null;
    return CalendarDate.fromDate(parsed);
  }

  /** Local midnight at the start of this day. */
  toDate(): Date {
    return new Date(this.year, this.month - 1, this.day);
  }

  format(): string {
    return format(this.toDate(), STORE_DATE_FORMAT);
  }

  addDays(amount: number): CalendarDate {
    return CalendarDate.fromDate(addDays(this.toDate(), amount));
  }

  compare(other: CalendarDate): number {
    if (this.year !== other.year) return this.year - other.year;
    if (this.month !== other.month) return this.month - other.month;
    return this.day - other.day;
  }

  isBefore(other: CalendarDate): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: CalendarDate): boolean {
    return this.compare(other) > 0;
  }

  equals(other: CalendarDate): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}

/** Format at the store boundary; null stays null. */
export function toStoreDate(date: CalendarDate | null | undefined): string | null {
  return date ? date.format() : null;
}

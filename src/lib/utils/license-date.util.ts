import { addDays, differenceInCalendarDays, format, isBefore, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';
export const DEFAULT_LICENSE_TIMEZONE = 'UTC';

/**
 * License validity is tracked in whole calendar days. "Today" is always resolved in
 * an explicit time zone so the result does not depend on the host's locale settings.
 */
export class LicenseDateUtil {
	static today(timeZone: string = DEFAULT_LICENSE_TIMEZONE, now: Date = new Date()): string {
		return formatInTimeZone(now, timeZone, CALENDAR_DATE_FORMAT);
	}

	static addDays(day: string, days: number): string {
		return format(addDays(parseISO(day), days), CALENDAR_DATE_FORMAT);
	}

	/** valid_until is inclusive: a license expiring today is still valid today. */
	static isExpired(validUntil: string, today: string): boolean {
		return isBefore(parseISO(validUntil), parseISO(today));
	}

	static daysUntil(day: string, today: string): number {
		return differenceInCalendarDays(parseISO(day), parseISO(today));
	}
}

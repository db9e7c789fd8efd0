import { DateTime } from 'luxon';

export const currentYear = (): number => DateTime.local().year;

export const toIsoUtc = (date: Date): string => DateTime.fromJSDate(date).toUTC().toISO() ?? date.toISOString();

import { InvalidScheduleError } from '../errors/invalid-schedule.error';

export type ScheduleSpec =
    | { kind: 'interval'; everyMs: number }
    | { kind: 'cron'; expression: string };

interface CronField {
    values: Set<number>;
    restricted: boolean;
}

export interface ParsedCron {
    expression: string;
    minute: CronField;
    hour: CronField;
    dayOfMonth: CronField;
    month: CronField;
    dayOfWeek: CronField;
}

const DAY_NAMES: Record<string, number> = { SUN: 0, MON: 1, TUE: 2, WED: 3, THU: 4, FRI: 5, SAT: 6 };
const MONTH_NAMES: Record<string, number> = {
    JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6, JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
};
// February counts its leap day: a day only reachable in leap years still matches.
const DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
// Consecutive leap years can be eight years apart (2096 to 2104).
const SEARCH_DAYS = 8 * 366 + 1;
const MINUTES_PER_DAY = 24 * 60;
const UNIT_MS: Record<string, number> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };

function parseField(
    expression: string,
    part: string,
    min: number,
    max: number,
    names: Record<string, number> = {},
): CronField {
    const toNumber = (token: string): number => {
        const named = names[token.toUpperCase()];
        const value = named ?? (/^\d+$/.test(token) ? parseInt(token, 10) : NaN);
        if (Number.isNaN(value) || value < min || value > max) {
            throw new InvalidScheduleError(expression, `"${token}" is outside ${min}-${max}`);
        }
        return value;
    };

    const values = new Set<number>();
    for (const item of part.split(',')) {
        const [range, stepText] = item.split('/');
        const step = stepText === undefined ? 1 : parseInt(stepText, 10);
        if (!Number.isInteger(step) || step <= 0) {
            throw new InvalidScheduleError(expression, `invalid step in "${item}"`);
        }

        let start: number;
        let end: number;
        if (range === '*') {
            start = min;
            end = max;
        } else if (range.includes('-')) {
            const [a, b] = range.split('-');
            start = toNumber(a);
            end = toNumber(b);
            if (start > end) throw new InvalidScheduleError(expression, `range "${range}" is reversed`);
        } else {
            start = toNumber(range);
            end = stepText === undefined ? start : max;
        }
        for (let v = start; v <= end; v += step) values.add(v);
    }
    return { values, restricted: part !== '*' };
}

/** Five fields, UTC: minute hour day-of-month month day-of-week. */
export function parseCron(expression: string): ParsedCron {
    const parts = expression.trim().split(/\s+/);
    if (parts.length !== 5) {
        throw new InvalidScheduleError(expression, 'a cron expression must have 5 fields');
    }

    const dayOfWeek = parseField(expression, parts[4], 0, 7, DAY_NAMES);
    if (dayOfWeek.values.delete(7)) dayOfWeek.values.add(0);

    const cron: ParsedCron = {
        expression,
        minute: parseField(expression, parts[0], 0, 59),
        hour: parseField(expression, parts[1], 0, 23),
        dayOfMonth: parseField(expression, parts[2], 1, 31),
        month: parseField(expression, parts[3], 1, 12, MONTH_NAMES),
        dayOfWeek,
    };

    // A restricted weekday always finds a date, so only day-of-month alone can be unreachable.
    if (!cron.dayOfWeek.restricted) {
        const reachable = [...cron.month.values].some(month =>
            [...cron.dayOfMonth.values].some(day => day <= DAYS_IN_MONTH[month - 1]),
        );
        if (!reachable) {
            throw new InvalidScheduleError(expression, 'no month has that day of the month');
        }
    }
    return cron;
}

function matchesDay(cron: ParsedCron, date: Date): boolean {
    const dom = cron.dayOfMonth.values.has(date.getUTCDate());
    const dow = cron.dayOfWeek.values.has(date.getUTCDay());
    // Standard cron: when both day fields are restricted, either may match.
    if (cron.dayOfMonth.restricted && cron.dayOfWeek.restricted) return dom || dow;
    return dom && dow;
}

function firstMinute(cron: ParsedCron, fromMinute: number): number | null {
    for (let m = fromMinute; m < MINUTES_PER_DAY; m++) {
        if (cron.hour.values.has(Math.floor(m / 60)) && cron.minute.values.has(m % 60)) return m;
    }
    return null;
}

/** First matching minute strictly after `from`. Walks day by day. */
export function nextCronOccurrence(cron: ParsedCron, from: Date): Date {
    const start = new Date(from.getTime());
    start.setUTCSeconds(0, 0);
    start.setUTCMinutes(start.getUTCMinutes() + 1);

    const day = new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate()));
    let fromMinute = start.getUTCHours() * 60 + start.getUTCMinutes();

    for (let i = 0; i < SEARCH_DAYS; i++) {
        if (cron.month.values.has(day.getUTCMonth() + 1) && matchesDay(cron, day)) {
            const minute = firstMinute(cron, fromMinute);
            if (minute !== null) return new Date(day.getTime() + minute * 60_000);
        }
        day.setUTCDate(day.getUTCDate() + 1);
        fromMinute = 0;
    }
    throw new InvalidScheduleError(cron.expression, 'no occurrence within eight years');
}

export function nextOccurrence(spec: ScheduleSpec, from: Date): Date {
    if (spec.kind === 'interval') return new Date(from.getTime() + spec.everyMs);
    return nextCronOccurrence(parseCron(spec.expression), from);
}

/**
 * Accepts `every <n><ms|s|m|h>` or a five-field cron expression.
 *
 * @example
 * parseSchedule('every 30s')   // { kind: 'interval', everyMs: 30000 }
 * parseSchedule('0 2 * * *')   // { kind: 'cron', expression: '0 2 * * *' }
 */
export function parseSchedule(text: string): ScheduleSpec {
    const trimmed = text.trim();
    const interval = /^every\s+(\d+)\s*(ms|s|m|h)$/i.exec(trimmed);
    if (interval) {
        const everyMs = parseInt(interval[1], 10) * UNIT_MS[interval[2].toLowerCase()];
        if (everyMs <= 0) throw new InvalidScheduleError(text, 'interval must be positive');
        return { kind: 'interval', everyMs };
    }
    parseCron(trimmed);
    return { kind: 'cron', expression: trimmed };
}

export function validateSchedule(spec: ScheduleSpec): void {
    if (spec.kind === 'interval') {
        if (!Number.isFinite(spec.everyMs) || spec.everyMs <= 0) {
            throw new InvalidScheduleError(`every ${spec.everyMs}ms`, 'interval must be positive');
        }
        return;
    }
    parseCron(spec.expression);
}

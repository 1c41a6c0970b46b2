// src/lib/utils/tradingCalendar.ts
// =============================================================================
// TRADING-DAY ARITHMETIC
// Saturday/Sunday are skipped; there is no holiday calendar, so an exchange
// holiday counts as a trading day here.
// Shared by the simulation horizon and the live position horizon.
// =============================================================================

import type { IsoDate } from '../../types';

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
    if (!ISO_DATE_RE.test(value)) return false;
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function toUtc(date: IsoDate): Date {
    if (!isIsoDate(date)) {
        throw new RangeError(`Invalid ISO date: ${date}`);
    }
    return new Date(`${date}T00:00:00Z`);
}

function fromUtc(d: Date): IsoDate {
    return d.toISOString().slice(0, 10);
}

export function isWeekend(date: IsoDate): boolean {
    const day = toUtc(date).getUTCDay();
    return day === 0 || day === 6;
}

/** Next weekday strictly after `date` */
export function nextTradingDate(date: IsoDate): IsoDate {
    let next = new Date(toUtc(date).getTime() + DAY_MS);
    while (next.getUTCDay() === 0 || next.getUTCDay() === 6) {
        next = new Date(next.getTime() + DAY_MS);
    }
    return fromUtc(next);
}

export function addTradingDays(date: IsoDate, days: number): IsoDate {
    let current = date;
    for (let i = 0; i < days; i++) {
        current = nextTradingDate(current);
    }
    return current;
}

/**
 * Calendar months back from `date`, clamping the day to the target month's
 * length (2024-08-31 minus 6 months → 2024-02-29).
 */
export function subtractMonths(date: IsoDate, months: number): IsoDate {
    const d = toUtc(date);
    const totalMonths = d.getUTCFullYear() * 12 + d.getUTCMonth() - months;
    const year = Math.floor(totalMonths / 12);
    const month = totalMonths - year * 12;
    const daysInMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
    const day = Math.min(d.getUTCDate(), daysInMonth);
    return fromUtc(new Date(Date.UTC(year, month, day)));
}

/** Today's calendar date in UTC */
export function todayIso(): IsoDate {
    return fromUtc(new Date());
}

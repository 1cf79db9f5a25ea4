import { tz } from "@date-fns/tz";
import { format, isValid, parse } from "date-fns";

/** Listing times without an explicit zone are US Eastern wall-clock times. */
export const EVENT_TIMEZONE = "America/New_York";

export interface WallClock {
    year: number;
    /** 1-12 */
    month: number;
    day: number;
    hour: number;
    minute: number;
}

const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

/**
 * Creates an exact UTC Date for a wall-clock time in the given zone.
 * Returns null when the components don't form a real calendar date (e.g. Feb 30).
 */
export function wallClockToUtc(wall: WallClock, timezone: string = EVENT_TIMEZONE): Date | null {
    const localString = `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)} ${pad(wall.hour)}:${pad(wall.minute)}`;
    try {
        const zonedDate = parse(localString, "yyyy-MM-dd HH:mm", new Date(), { in: tz(timezone) });
        if (!isValid(zonedDate)) return null;
        // Drop the zone wrapper; callers only need the absolute instant.
        return new Date(zonedDate.getTime());
    } catch (err) {
        console.warn(`[timezone] Failed to compose ${localString} in ${timezone}`, err);
        return null;
    }
}

/**
 * Same as wallClockToUtc, for a fixed offset in minutes east of UTC.
 */
export function wallClockAtOffset(wall: WallClock, offsetMinutes: number): Date | null {
    if (wall.month < 1 || wall.month > 12 || wall.hour > 23 || wall.minute > 59) return null;
    const ms = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute);
    const check = new Date(ms);
    // Date.UTC rolls Feb 30 over into March; reject instead.
    if (check.getUTCDate() !== wall.day) return null;
    return new Date(ms - offsetMinutes * 60_000);
}

/** Calendar year of an instant as seen in the given zone. */
export function yearInZone(date: Date, timezone: string = EVENT_TIMEZONE): number {
    return Number(format(date, "yyyy", { in: tz(timezone) }));
}

/*
 All datetimes leaving this service are timezone-naive UTC:
   run stamp      20240321_140500
   iso timestamp  2024-03-21T14:05:00
   naive datetime 2024-03-21 14:05:00
*/

export function formatRunStamp(date: Date): string {
    return formatIsoTimestamp(date).replace(/[-:]/g, "").replace("T", "_");
}

export function formatIsoTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19);
}

export function formatNaiveDateTime(date: Date): string {
    return formatIsoTimestamp(date).replace("T", " ");
}

export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function fromUnixSeconds(seconds: number): Date {
    return new Date(seconds * 1000);
}

const DATETIME =
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function offsetMinutes(offset: string): number {
    if (offset === "Z") return 0;

    const sign = offset.startsWith("-") ? -1 : 1;
    const digits = offset.slice(1).replace(":", "");

    return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Normalizes a date or datetime string to `YYYY-MM-DD HH:MM:SS`.
 * Seconds and fractions are optional; a bare date means midnight.
 * Values carrying an offset are converted to UTC first.
 * Returns null for anything else, including calendar-impossible values.
 */
export function toNaiveDateTime(value: string): string | null {
    const match = DATETIME.exec(value.trim());
    if (!match) return null;

    const [, year, month, day, hours = "00", minutes = "00", seconds = "00", offset] = match;
    const parts = [year, month, day, hours, minutes, seconds].map(Number);
    const [y, mo, d, h, mi, s] = parts;

    const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));

    const roundTrips =
        date.getUTCFullYear() === y &&
        date.getUTCMonth() === mo - 1 &&
        date.getUTCDate() === d &&
        date.getUTCHours() === h &&
        date.getUTCMinutes() === mi &&
        date.getUTCSeconds() === s;

    if (!roundTrips) return null;

    if (offset) {
        return formatNaiveDateTime(new Date(date.getTime() - offsetMinutes(offset) * 60_000));
    }

    return formatNaiveDateTime(date);
}

export function normalizeColumnName(name: string): string {
    return name.trim().toLowerCase();
}

/** Blank means null, undefined, NaN, or a string with nothing but whitespace. */
export function isBlankCell(value: unknown): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === 'number') return Number.isNaN(value);
    if (typeof value === 'string') return value.trim().length === 0;
    return false;
}

export function cellToText(value: unknown): string {
    if (isBlankCell(value)) return '';
    return String(value).replace(/\r\n/g, '\n').trim();
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in the server's local time zone. */
export function formatTimestamp(date: Date): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}

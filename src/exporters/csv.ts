/**
 * RFC 4180 field quoting for the CSV files this tool writes.
 */

/**
 * Quote a field when it contains a delimiter, quote or line break.
 */
export function escapeCsvField(value: string | number): string {
    const text = String(value);
    if (/[",\r\n]/.test(text)) return `"${text.replace(/"/g, '""')}"`;
    return text;
}

/**
 * Quote every field unconditionally.
 */
export function quoteCsvField(value: string | number): string {
    return `"${String(value).replace(/"/g, '""')}"`;
}

export function toCsvLine(fields: readonly (string | number)[], quoteAll = false): string {
    return fields.map(quoteAll ? quoteCsvField : escapeCsvField).join(',');
}

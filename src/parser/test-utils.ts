/**
 * Shared test utilities for the parser tests.
 */

/**
 * Get offset from a cursor marker (|) in text.
 * Returns { cleanText, offset } where cleanText has the marker removed.
 */
export function parseCursor(text: string, marker = '|'): { cleanText: string; offset: number } {
    const offset = text.indexOf(marker);
    if (offset === -1) {
        throw new Error(`Cursor marker '${marker}' not found in text`);
    }
    const cleanText = text.replace(marker, '');
    return { cleanText, offset };
}

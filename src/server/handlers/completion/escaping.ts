/**
 * Insertion text escaping per document format.
 *
 * The inserted text must read back as the intended value: inside a string it
 * is escaped for that string; when it replaces a whole bare token it also
 * gets the delimiters the format needs.
 */

import { DocumentFormat, PartialToken } from '../../../parser';

export interface EscapeOptions {
    /** The insertion replaces the whole token, so it may add delimiters */
    wholeToken: boolean;
    /** Non-string value (boolean) */
    literal: boolean;
}

const YAML_INDICATOR = /^[-?:,[\]{}#&*!|>'"%@`]/;

export function escapeJsonContent(value: string): string {
    return JSON.stringify(value).slice(1, -1);
}

export function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

/**
 * Whether a YAML plain scalar would not read back as `value`.
 */
export function needsYamlQuotes(value: string): boolean {
    return value === ''
        || value !== value.trim()
        || YAML_INDICATOR.test(value)
        || /:(\s|$)/.test(value)
        || /\s#/.test(value);
}

export function escapeInsertion(
    value: string,
    token: PartialToken,
    format: DocumentFormat,
    options: EscapeOptions
): string {
    switch (format) {
        case 'json':
            if (token.quote === '"') return escapeJsonContent(value);
            return options.wholeToken && !options.literal ? JSON.stringify(value) : value;

        case 'yaml':
            if (token.quote === "'") return value.replace(/'/g, "''");
            if (token.quote === '"') return escapeJsonContent(value);
            if (options.wholeToken && !options.literal && needsYamlQuotes(value)) {
                return `'${value.replace(/'/g, "''")}'`;
            }
            return value;

        case 'plist': {
            const escaped = escapeXml(value);
            if (token.element !== undefined || !options.wholeToken) return escaped;
            if (token.position === 'key') return `<key>${escaped}</key>`;
            if (options.literal) return `<${escaped}/>`;
            return `<string>${escaped}</string>`;
        }

        case 'xml': {
            const escaped = escapeXml(value);
            if (token.element !== undefined || !options.wholeToken) return escaped;
            return token.position === 'key' ? `<${escaped}></${escaped}>` : escaped;
        }

        case 'text':
            return value;
    }
}

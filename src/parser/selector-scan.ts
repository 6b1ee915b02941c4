/**
 * Scope selector scanning.
 *
 * Selectors combine scope names with ` ` (descendant), `,` and `|` (or),
 * `&` (and), `-` (without) and parentheses. A `-` directly after a scope-name
 * character belongs to the name (`meta.function-call`).
 */

const SCOPE_CHAR = /[\w.+#$:-]/;
const COMBINATORS = new Set([' ', '\t', '\n', '>', ',', '|', '&', '(', ')']);

export interface SelectorScan {
    inSelector: boolean;
    selectorWord: string;
    selectorWordStart: number;
}

/**
 * Scan the selector text typed so far.
 * @param text - Selector text from its first character up to the cursor
 * @param start - Document offset of `text[0]`
 */
export function scanSelector(text: string, start: number): SelectorScan {
    let depth = 0;
    let wordStart = 0;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === '(') depth++;
        else if (char === ')') depth = Math.max(0, depth - 1);

        if (COMBINATORS.has(char)) {
            wordStart = i + 1;
        } else if (char === '-' && (i === 0 || !SCOPE_CHAR.test(text[i - 1]))) {
            wordStart = i + 1;
        }
    }

    return {
        inSelector: depth > 0,
        selectorWord: text.substring(wordStart),
        selectorWordStart: start + wordStart,
    };
}

/**
 * A selector atom: one scope name with its offset inside the selector.
 */
export interface SelectorAtom {
    name: string;
    offset: number;
}

/**
 * Split a selector into its scope-name atoms.
 */
export function selectorAtoms(selector: string): SelectorAtom[] {
    const atoms: SelectorAtom[] = [];
    let current = '';
    let currentStart = 0;

    const flush = () => {
        if (current.length > 0) {
            atoms.push({ name: current, offset: currentStart });
        }
        current = '';
    };

    for (let i = 0; i < selector.length; i++) {
        const char = selector[i];
        const isMinusOperator = char === '-' && current.length === 0;
        if (COMBINATORS.has(char) || isMinusOperator) {
            flush();
            continue;
        }
        if (current.length === 0) currentStart = i;
        current += char;
    }
    flush();

    return atoms;
}

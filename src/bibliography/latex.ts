/**
 * Accent commands and the Unicode combining marks they stand for.
 */
const COMBINING_MARKS: Record<string, string> = {
    '"': '\u0308',
    "'": '\u0301',
    '`': '\u0300',
    '^': '\u0302',
    '~': '\u0303',
    '=': '\u0304',
    '.': '\u0307',
    c: '\u0327',
    u: '\u0306',
    v: '\u030C',
    H: '\u030B',
    k: '\u0328',
    r: '\u030A',
};

/** Letter-like commands without an argument. */
const SYMBOLS: Record<string, string> = {
    o: 'ø',
    O: 'Ø',
    l: 'ł',
    L: 'Ł',
    ss: 'ß',
    aa: 'å',
    AA: 'Å',
    ae: 'æ',
    AE: 'Æ',
    oe: 'œ',
    OE: 'Œ',
    i: 'ı',
};

const ACCENT = /\\(["'`^~=.]|[cuvHkr](?![A-Za-z]))\s*(?:\{\s*([A-Za-z])\s*\}|([A-Za-z]))/g;
const SYMBOL = /\\(ss|aa|AA|ae|AE|oe|OE|o|O|l|L|i)(?![A-Za-z])/g;

/**
 * Convert common LaTeX accent and letter commands to Unicode and drop grouping braces.
 * `{\"u}ber` → `über`, `\AA{}ngstr{\"o}m` → `Ångström`.
 */
export function latexToUnicode(text: string): string {
    return stripBraces(
        text
            .replace(ACCENT, (_match, command: string, braced: string | undefined, bare: string | undefined) => {
                const letter = braced ?? bare ?? '';
                const mark = COMBINING_MARKS[command] ?? '';
                return `${letter}${mark}`.normalize('NFC');
            })
            .replace(SYMBOL, (_match, command: string) => SYMBOLS[command] ?? command)
    )
        .replace(/\s+/g, ' ')
        .trim();
}

export function stripBraces(text: string): string {
    return text.replace(/[{}]/g, '');
}

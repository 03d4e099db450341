import { ValidationError } from '../utils/errors.js';
import type { CslName } from './csl.js';
import { latexToUnicode } from './latex.js';

/**
 * A person's name split into the parts citation keys and aliases need.
 * `particle` is the "von" part (CSL: non-dropping particle).
 * When `literal` is set (an institution, a mononym) it overrides the rest.
 */
export interface PersonName {
    given: string;
    particle: string;
    family: string;
    suffix: string;
    literal: string | null;
}

/**
 * Canonical alias for a name: "von Last, Jr, First" with empty parts left out.
 * Both the BibTeX and the CSL-JSON importers look people up by this string.
 */
export function renderAlias(name: PersonName): string {
    if (name.literal) return name.literal;
    const vonLast = [name.particle, name.family].filter(Boolean).join(' ');
    return [vonLast, name.suffix, name.given].filter(Boolean).join(', ');
}

/**
 * Surname as it appears in author-date citations ("van Dyke", "IPCC").
 */
export function citationSurname(name: PersonName): string {
    if (name.literal) return name.literal;
    return [name.particle, name.family].filter(Boolean).join(' ');
}

/**
 * Column values for a Person created from this name.
 */
export function personFields(name: PersonName): { given_names: string; last_name: string; suffix: string } {
    if (name.literal) {
        return { given_names: '', last_name: name.literal, suffix: '' };
    }
    return { given_names: name.given, last_name: citationSurname(name), suffix: name.suffix };
}

// ─── CSL-JSON names ──────────────────────────────────────

export function cslNameToPersonName(name: CslName): PersonName {
    const literal = name.literal?.trim();
    if (literal) {
        return { given: '', particle: '', family: '', suffix: '', literal };
    }

    const family = name.family?.trim() ?? '';
    if (family === '') {
        throw new ValidationError(`Name ${JSON.stringify(name)} has neither a family name nor a literal`, {
            field: 'family',
        });
    }

    return {
        given: [name.given?.trim(), name['dropping-particle']?.trim()].filter(Boolean).join(' '),
        particle: name['non-dropping-particle']?.trim() ?? '',
        family,
        suffix: name.suffix?.trim() ?? '',
        literal: null,
    };
}

// ─── BibTeX names ────────────────────────────────────────

/**
 * Split a BibTeX name list on " and " outside braces.
 */
export function splitBibtexNames(value: string): string[] {
    const names: string[] = [];
    let depth = 0;
    let start = 0;

    for (let i = 0; i < value.length; i++) {
        const ch = value[i];
        if (ch === '{') depth++;
        else if (ch === '}') depth = Math.max(0, depth - 1);
        else if (depth === 0 && /\s/.test(ch ?? '')) {
            const match = /^\s+and\s+/i.exec(value.slice(i));
            if (match) {
                names.push(value.slice(start, i));
                i += match[0].length - 1;
                start = i + 1;
            }
        }
    }
    names.push(value.slice(start));

    return names.map((name) => name.trim()).filter((name) => name !== '');
}

/**
 * Parse every name in a BibTeX author/editor field. "others" is dropped.
 */
export function parseBibtexNames(value: string): PersonName[] {
    return splitBibtexNames(value)
        .filter((name) => name.toLowerCase() !== 'others')
        .map(parseBibtexName);
}

/**
 * Parse one BibTeX name in any of its three forms:
 * "First von Last", "von Last, First", "von Last, Jr, First".
 */
export function parseBibtexName(raw: string): PersonName {
    const parts = splitTopLevel(raw, ',').map((part) => splitWords(part));

    let given: string[] = [];
    let particle: string[] = [];
    let family: string[] = [];
    let suffix: string[] = [];

    if (parts.length === 1) {
        const words = parts[0] ?? [];
        const lastIndex = words.length - 1;
        const lower = words.map((word, i) => i < lastIndex && startsLowercase(word));
        const first = lower.indexOf(true);
        const last = lower.lastIndexOf(true);

        if (first === -1) {
            given = words.slice(0, lastIndex);
            family = words.slice(lastIndex);
        } else {
            given = words.slice(0, first);
            particle = words.slice(first, last + 1);
            family = words.slice(last + 1);
        }
    } else if (parts.length === 2 || parts.length === 3) {
        [particle, family] = splitVonLast(parts[0] ?? []);
        if (parts.length === 2) {
            given = parts[1] ?? [];
        } else {
            suffix = parts[1] ?? [];
            given = parts[2] ?? [];
        }
    } else {
        throw new ValidationError(`Too many commas in name "${raw}"`, { field: 'author' });
    }

    const name: PersonName = {
        given: latexToUnicode(given.join(' ')),
        particle: latexToUnicode(particle.join(' ')),
        family: latexToUnicode(family.join(' ')),
        suffix: latexToUnicode(suffix.join(' ')),
        literal: null,
    };

    if (name.family === '') {
        throw new ValidationError(`Name "${raw}" has no last name`, { field: 'author' });
    }
    return name;
}

/**
 * In "von Last" the particle runs up to the last lowercase word, but the
 * final word always belongs to the last name.
 */
function splitVonLast(words: string[]): [string[], string[]] {
    let last = -1;
    for (let i = 0; i < words.length - 1; i++) {
        if (startsLowercase(words[i] ?? '')) last = i;
    }
    if (last === -1 || !startsLowercase(words[0] ?? '')) {
        return [[], words];
    }
    return [words.slice(0, last + 1), words.slice(last + 1)];
}

/**
 * A word is lowercase when its first letter outside braces is lowercase.
 * Fully braced words ("{van}") count as uppercase.
 */
function startsLowercase(word: string): boolean {
    let depth = 0;
    for (const ch of word) {
        if (ch === '{') depth++;
        else if (ch === '}') depth = Math.max(0, depth - 1);
        else if (depth === 0 && /\p{L}/u.test(ch)) {
            return ch === ch.toLowerCase() && ch !== ch.toUpperCase();
        }
    }
    return false;
}

function splitTopLevel(text: string, separator: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let current = '';
    for (const ch of text) {
        if (ch === '{') depth++;
        else if (ch === '}') depth = Math.max(0, depth - 1);
        if (ch === separator && depth === 0) {
            parts.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    parts.push(current);
    return parts;
}

function splitWords(text: string): string[] {
    return splitTopLevel(text.replace(/~/g, ' ').replace(/\s+/g, ' '), ' ').filter((word) => word !== '');
}

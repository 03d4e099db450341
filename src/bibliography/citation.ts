/**
 * Citation text, citation keys (slugs) and identifier cleanup shared by the
 * importers, the exporter and the CLI.
 */

import { ValidationError } from '../utils/errors.js';

const DISAMBIGUATION_LETTERS = 'abcdefghijklmnopqrstuvwxyz';

// ─── Identifiers ──────────────────────────────────────────

/**
 * Strip DOI resolver prefixes and lowercase the identifier.
 * "https://doi.org/10.1234/ABC" → "10.1234/abc"
 */
export function normalizeDoi(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return (
        doi
            .trim()
            .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
            .replace(/^doi:\s*/i, '')
            .trim()
            .toLowerCase() || null
    );
}

/**
 * Clean a title taken from a bibliographic source: no braces, single spaces.
 */
export function cleanTitle(title: string | null | undefined): string {
    if (!title) return '';
    return title.replace(/[{}]/g, '').replace(/\s+/g, ' ').trim();
}

// ─── Citation text ────────────────────────────────────────

/**
 * Author-date citation text from ordered author surnames:
 * "Smith 2019", "Smith and Jones 2019", "Smith et al. 2019".
 */
export function authorDateKey(surnames: readonly string[], year: number): string {
    const [first, second] = surnames;
    let authors: string;
    if (first === undefined) {
        authors = '<no authors>';
    } else if (surnames.length === 1) {
        authors = first;
    } else if (surnames.length === 2) {
        authors = `${first} and ${second ?? ''}`;
    } else {
        authors = `${first} et al.`;
    }
    return `${authors} ${year}`;
}

/**
 * One-line label for a publication: `Smith 2019: "Holocene lake levels in..."`.
 */
export function describePublication(publication: { title: string; year: number }, surnames: readonly string[]): string {
    const title =
        publication.title.length > 25 ? `${publication.title.slice(0, 25).trim()}...` : publication.title;
    return `${authorDateKey(surnames, publication.year)}: "${title}"`;
}

// ─── Slugs ────────────────────────────────────────────────

/**
 * Fold to ASCII: decompose, then drop whatever is left outside ASCII.
 */
export function asciiFold(text: string): string {
    return text.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');
}

/**
 * Slug before disambiguation: "smith19", "smith_and_jones19", "smith_etal19",
 * or "anon19" without authors.
 */
export function slugBase(surnames: readonly string[], year: number): string {
    const yy = String(year).slice(-2).padStart(2, '0');
    const [first, second] = surnames;

    let stem: string;
    if (first === undefined) {
        stem = 'anon';
    } else if (surnames.length === 1) {
        stem = first;
    } else if (surnames.length === 2) {
        stem = `${first}_and_${second ?? ''}`;
    } else {
        stem = `${first}_etal`;
    }

    return asciiFold(`${stem}${yy}`).toLowerCase().replace(/\s+/g, '');
}

/**
 * First free candidate of `base`, `base`a … `base`z.
 * Throws ValidationError when all 27 are taken.
 */
export function chooseSlug(base: string, isTaken: (slug: string) => boolean): string {
    for (const suffix of ['', ...DISAMBIGUATION_LETTERS]) {
        const candidate = `${base}${suffix}`;
        if (!isTaken(candidate)) return candidate;
    }
    throw new ValidationError(`No free slug left for "${base}" (tried ${base} and ${base}a to ${base}z)`, {
        field: 'slug',
    });
}

/**
 * Drop a trailing disambiguation letter from a generated slug:
 * "smith19a" → "smith19". Slugs without one come back unchanged.
 */
export function stripDisambiguation(slug: string): string {
    const match = /^(.*\d{2})[a-z]$/.exec(slug);
    return match?.[1] ?? slug;
}

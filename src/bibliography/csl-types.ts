import { readFileSync } from 'node:fs';
import { z } from 'zod';

const TypeTableSchema = z.object({
    cslTypes: z.array(z.string()).nonempty(),
    bibtexTypes: z.record(z.string()),
});

/**
 * CSL item types and the BibTeX entry type mapping, read from data/csl-types.json.
 */
const TYPE_TABLE = TypeTableSchema.parse(
    JSON.parse(readFileSync(new URL('../../data/csl-types.json', import.meta.url), 'utf-8'))
);

export const CSL_TYPES: ReadonlySet<string> = new Set(TYPE_TABLE.cslTypes);

/** Type used when a source names none. */
export const DEFAULT_CSL_TYPE = 'article-journal';

export function isCslType(type: string): boolean {
    return CSL_TYPES.has(type);
}

/**
 * Map a BibTeX entry type (`@article`, `@phdthesis`, ...) to a CSL item type.
 * Unknown entry types become "document".
 */
export function cslTypeForBibtex(entryType: string): string {
    return TYPE_TABLE.bibtexTypes[entryType.toLowerCase()] ?? 'document';
}

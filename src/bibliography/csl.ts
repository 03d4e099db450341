import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../utils/errors.js';

/**
 * CSL-JSON name variables, in the order their authorships are stored.
 */
export const CSL_NAME_ROLES = [
    'author',
    'editor',
    'translator',
    'collection-editor',
    'container-author',
    'composer',
    'director',
    'editorial-director',
    'illustrator',
    'interviewer',
    'original-author',
    'recipient',
    'reviewed-author',
] as const;

export type CslNameRole = (typeof CSL_NAME_ROLES)[number];

export const CslNameSchema = z
    .object({
        family: z.string(),
        given: z.string(),
        'non-dropping-particle': z.string(),
        'dropping-particle': z.string(),
        suffix: z.string(),
        literal: z.string(),
    })
    .partial()
    .passthrough();

export type CslName = z.infer<typeof CslNameSchema>;

const DatePart = z.union([z.number(), z.string()]);

export const CslDateSchema = z
    .object({
        'date-parts': z.array(z.array(DatePart)),
        raw: z.string(),
        literal: z.string(),
    })
    .partial()
    .passthrough();

const NameList = z.array(CslNameSchema).optional();

/**
 * One CSL-JSON item. Known fields are checked; anything else passes through
 * and ends up as residual metadata.
 */
export const CslItemSchema = z
    .object({
        id: z.union([z.string(), z.number()]).optional(),
        type: z.string().optional(),
        title: z.string().optional(),
        DOI: z.string().optional(),
        URL: z.string().optional(),
        abstract: z.string().optional(),
        issued: z.union([CslDateSchema, z.string(), z.number()]).optional(),
        year: z.union([z.string(), z.number()]).optional(),
        author: NameList,
        editor: NameList,
        translator: NameList,
        'collection-editor': NameList,
        'container-author': NameList,
        composer: NameList,
        director: NameList,
        'editorial-director': NameList,
        illustrator: NameList,
        interviewer: NameList,
        'original-author': NameList,
        recipient: NameList,
        'reviewed-author': NameList,
    })
    .passthrough();

export type CslItem = z.infer<typeof CslItemSchema>;

/**
 * Fields the importer maps onto publication columns or authorships.
 * Everything else is residual.
 */
export const CONSUMED_CSL_FIELDS: ReadonlySet<string> = new Set<string>([
    'id',
    'type',
    'title',
    'date',
    'DOI',
    'URL',
    'abstract',
    'issued',
    'year',
    ...CSL_NAME_ROLES,
]);

/**
 * Parse CSL-JSON text (or an already-decoded value) into validated items.
 * Accepts a single item or an array of items.
 */
export function parseCslSource(source: unknown): CslItem[] {
    let decoded: unknown = source;
    if (typeof source === 'string') {
        try {
            decoded = JSON.parse(source);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ValidationError(`Malformed CSL-JSON: ${message}`, { cause: error });
        }
    }

    const list = Array.isArray(decoded) ? decoded : [decoded];
    const items: CslItem[] = [];
    const issues: ValidationIssue[] = [];

    list.forEach((value, index) => {
        const parsed = CslItemSchema.safeParse(value);
        if (parsed.success) {
            items.push(parsed.data);
        } else {
            for (const issue of parsed.error.issues) {
                issues.push({ path: [index, ...issue.path], message: issue.message });
            }
        }
    });

    if (issues.length > 0) {
        throw new ValidationError(`Malformed CSL-JSON: ${issues.length} problem(s)`, { issues });
    }
    return items;
}

/**
 * Year of a bibliographic entry: a plain "year" field, else a "date" or
 * "issued" value. The first four characters must be digits.
 */
export function extractYear(fields: { [name: string]: unknown }, label: string): number {
    for (const name of ['year', 'date', 'issued']) {
        const text = dateText(fields[name]);
        if (text === undefined) continue;

        const digits = text.trim().slice(0, 4);
        if (!/^\d{4}$/.test(digits)) {
            throw new ValidationError(`Unreadable ${name} "${text}" in entry "${label}"`, { field: name });
        }
        return Number(digits);
    }

    throw new ValidationError(`No year in entry "${label}"`, { field: 'year' });
}

function dateText(value: unknown): string | undefined {
    if (typeof value === 'number') return String(value);
    if (typeof value === 'string') return value.trim() === '' ? undefined : value;

    const parsed = CslDateSchema.safeParse(value);
    if (!parsed.success || value === undefined) return undefined;

    const first = parsed.data['date-parts']?.[0]?.[0];
    if (first !== undefined) return String(first);
    return parsed.data.raw ?? parsed.data.literal;
}

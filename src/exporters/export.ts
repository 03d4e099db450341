import { writeFileSync } from 'node:fs';
import { formatBibtexEntry } from '../bibliography/bibtex.js';
import { CONSUMED_CSL_FIELDS } from '../bibliography/csl.js';
import { decodeMetaValue } from '../bibliography/importer.js';
import type { CuratorStore } from '../storage/index.js';
import { META_ANNOTATION_TYPE, type AuthorshipWithName, type Publication } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'csl-json' | 'bibtex';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csl-json', 'bibtex'];

interface ExportedName {
    family: string;
    given?: string;
    suffix?: string;
}

/**
 * One exported CSL-JSON item.
 */
export type CslExportItem = { [field: string]: unknown } & {
    id: string;
    type: string;
    title: string;
    issued: { 'date-parts': number[][] };
};

/** CSL item types with a dedicated BibTeX entry type; everything else is @misc. */
const BIBTEX_ENTRY_TYPES: { [cslType: string]: string } = {
    'article-journal': 'article',
    'article-magazine': 'article',
    'article-newspaper': 'article',
    book: 'book',
    chapter: 'incollection',
    'paper-conference': 'inproceedings',
    report: 'techreport',
    thesis: 'phdthesis',
    manuscript: 'unpublished',
};

// ─── Main Export Function ────────────────────────────────

/**
 * Write every publication to `outputPath` in the given format.
 */
export function exportPublications(store: CuratorStore, outputPath: string, format: ExportFormat): number {
    const publications = store.publications.list();
    writeFileSync(outputPath, renderPublications(store, format, publications), 'utf-8');
    getLogger().info({ format, outputPath, publications: publications.length }, 'Publications exported');
    return publications.length;
}

export function renderPublications(
    store: CuratorStore,
    format: ExportFormat,
    publications: Publication[] = store.publications.list()
): string {
    switch (format) {
        case 'csl-json':
            return `${JSON.stringify(publications.map((publication) => toCslItem(store, publication)), null, 2)}\n`;
        case 'bibtex':
            return `${publications.map((publication) => toBibtex(store, publication)).join('\n\n')}\n`;
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }
}

// ─── Format Implementations ─────────────────────────────

/**
 * CSL-JSON item for a publication: its columns, its people per role in
 * position order, and its `meta` tags decoded back to their source fields.
 */
export function toCslItem(store: CuratorStore, publication: Publication): CslExportItem {
    const item: CslExportItem = {
        id: publication.slug,
        type: publication.type,
        title: publication.title,
        issued: { 'date-parts': [[publication.year]] },
    };
    if (publication.doi) item['DOI'] = publication.doi;
    if (publication.url) item['URL'] = publication.url;
    if (publication.abstract) item['abstract'] = publication.abstract;

    for (const [role, people] of groupByRole(store.publications.listAuthorships(publication.publication_id))) {
        item[role] = people.map(toCslName);
    }

    const owner = { kind: 'publication' as const, id: publication.publication_id };
    for (const tag of store.annotations.listTags(owner, META_ANNOTATION_TYPE)) {
        const field = tag.comment || tag.key;
        if (CONSUMED_CSL_FIELDS.has(field)) continue;
        item[field] = decodeMetaValue(tag.value);
    }

    return item;
}

function toBibtex(store: CuratorStore, publication: Publication): string {
    const fields: { [name: string]: string } = {};

    for (const [role, people] of groupByRole(store.publications.listAuthorships(publication.publication_id))) {
        if (role !== 'author' && role !== 'editor' && role !== 'translator') continue;
        fields[role] = people.map(toBibtexName).join(' and ');
    }
    fields['title'] = publication.title;
    fields['year'] = String(publication.year);
    if (publication.doi) fields['doi'] = publication.doi;
    if (publication.url) fields['url'] = publication.url;
    if (publication.abstract) fields['abstract'] = publication.abstract;

    return formatBibtexEntry({
        key: publication.slug,
        type: BIBTEX_ENTRY_TYPES[publication.type] ?? 'misc',
        fields,
    });
}

function groupByRole(authorships: AuthorshipWithName[]): Map<string, AuthorshipWithName[]> {
    const roles = new Map<string, AuthorshipWithName[]>();
    for (const authorship of authorships) {
        const list = roles.get(authorship.role) ?? [];
        list.push(authorship);
        roles.set(authorship.role, list);
    }
    return roles;
}

function toCslName(person: AuthorshipWithName): ExportedName {
    const name: ExportedName = { family: person.last_name };
    if (person.given_names) name.given = person.given_names;
    if (person.suffix) name.suffix = person.suffix;
    return name;
}

function toBibtexName(person: AuthorshipWithName): string {
    return [person.last_name, person.suffix, person.given_names].filter(Boolean).join(', ');
}

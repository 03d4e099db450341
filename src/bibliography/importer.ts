/**
 * Bibliographic import pipeline.
 *
 * BibTeX and CSL-JSON entries are mapped onto publications, their people are
 * resolved through aliases (or created), and every write happens inside an
 * audited revision. BibTeX imports are one revision; CSL-JSON imports are
 * committed one chunk at a time.
 */

import type { RevisionScope } from '../audit/revisions.js';
import type { CuratorStore } from '../storage/index.js';
import {
    DEFAULT_CONFIG,
    META_ANNOTATION_TYPE,
    type AuthorshipInput,
    type EntityRef,
    type Person,
    type Publication,
    type PublicationInput,
} from '../types/index.js';
import { UniqueConstraintViolation, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { BibtexParseError, formatBibtexEntry, parseBibtex, type BibtexEntry } from './bibtex.js';
import { chooseSlug, cleanTitle, normalizeDoi, slugBase, stripDisambiguation } from './citation.js';
import { CONSUMED_CSL_FIELDS, CSL_NAME_ROLES, extractYear, parseCslSource, type CslItem } from './csl.js';
import { DEFAULT_CSL_TYPE, cslTypeForBibtex, isCslType } from './csl-types.js';
import { latexToUnicode } from './latex.js';
import { cslNameToPersonName, parseBibtexNames, personFields, renderAlias, type PersonName } from './names.js';

/** BibTeX fields holding name lists. */
const BIBTEX_NAME_FIELDS = ['author', 'editor', 'translator'] as const;

export interface ImportOptions {
    /** Recorded on every revision */
    actor?: string;
    /** Revision comment; a description of the batch is used when omitted */
    comment?: string;
    /** Replace authorships of publications that already exist */
    updateAuthors?: boolean;
    /** Regenerate slugs of publications that already exist (CSL-JSON only) */
    regenerateSlugs?: boolean;
    /** Store unconsumed fields as `meta` tags (CSL-JSON only) */
    tagResidualFields?: boolean;
    /** Items per transaction (CSL-JSON only) */
    chunkSize?: number;
}

type ResolvedOptions = Required<Omit<ImportOptions, 'comment'>> & Pick<ImportOptions, 'comment'>;

/**
 * Publication columns and name lists taken from one source entry.
 */
interface MappedEntry {
    label: string;
    fields: Omit<PublicationInput, 'slug'>;
    names: Array<[role: string, names: PersonName[]]>;
    residual: Array<[field: string, value: unknown]>;
}

interface ResolvedAuthors {
    authorships: AuthorshipInput[];
    /** Surnames that drive the slug: authors, else editors */
    slugSurnames: string[];
    /** People created while resolving, in creation order */
    createdPeople: number[];
}

// ─── BibTeX ──────────────────────────────────────────────

/**
 * Import BibTeX text as one audited transaction. Entries are matched to
 * existing publications by citation key, which becomes the slug.
 */
export function importBibtex(store: CuratorStore, text: string, options: ImportOptions = {}): Publication[] {
    const resolved = resolveOptions(options);

    let entries: BibtexEntry[];
    try {
        entries = parseBibtex(text);
    } catch (error) {
        if (error instanceof BibtexParseError) {
            throw new ValidationError(`Malformed BibTeX: ${error.message}`, { cause: error });
        }
        throw error;
    }

    if (entries.length === 0) {
        getLogger().warn('No BibTeX entries found');
        return [];
    }

    const comment = resolved.comment ?? `Import ${entries.length} BibTeX entr${entries.length === 1 ? 'y' : 'ies'}`;
    const publications = store.revisions.run({ actor: resolved.actor, comment }, (scope) =>
        entries.map((entry) => importBibtexEntry(store, scope, entry, resolved))
    );

    getLogger().info({ entries: entries.length }, 'BibTeX import complete');
    return publications;
}

function importBibtexEntry(
    store: CuratorStore,
    scope: RevisionScope,
    entry: BibtexEntry,
    options: ResolvedOptions
): Publication {
    const mapped = mapBibtexEntry(entry);
    const existing = store.publications.findBySlug(entry.key);

    if (existing) {
        scope.touch(publicationRef(existing));
        const updated = store.publications.update(existing.publication_id, mapped.fields);
        if (options.updateAuthors) {
            store.publications.replaceAuthorships(existing.publication_id, resolveAuthors(store, scope, mapped).authorships);
        }
        getLogger().debug({ slug: entry.key }, 'Publication updated from BibTeX');
        return updated;
    }

    const authors = resolveAuthors(store, scope, mapped);
    const created = store.publications.create({ ...mapped.fields, slug: entry.key });
    scope.created(publicationRef(created));
    store.publications.replaceAuthorships(created.publication_id, authors.authorships);
    getLogger().debug({ slug: entry.key }, 'Publication created from BibTeX');
    return created;
}

function mapBibtexEntry(entry: BibtexEntry): MappedEntry {
    const { fields } = entry;
    const text = (name: string): string | null => {
        const value = fields[name];
        return value === undefined ? null : latexToUnicode(value) || null;
    };

    const names: MappedEntry['names'] = [];
    for (const role of BIBTEX_NAME_FIELDS) {
        const value = fields[role];
        if (value !== undefined) names.push([role, parseBibtexNames(value)]);
    }

    return {
        label: entry.key,
        fields: {
            title: text('title') ?? 'Untitled',
            year: extractYear(fields, entry.key),
            doi: normalizeDoi(fields['doi']),
            url: fields['url']?.trim() || null,
            type: cslTypeForBibtex(entry.type),
            abstract: text('abstract'),
            source_text: formatBibtexEntry(entry),
        },
        names,
        residual: [],
    };
}

// ─── CSL-JSON ────────────────────────────────────────────

/**
 * Import CSL-JSON items, committing each chunk of `chunkSize` items as its
 * own audited transaction. A failing item rolls back only its chunk;
 * chunks committed before it stay committed and the error is rethrown.
 */
export function importCslJson(store: CuratorStore, source: unknown, options: ImportOptions = {}): Publication[] {
    const resolved = resolveOptions(options);
    if (!Number.isInteger(resolved.chunkSize) || resolved.chunkSize < 1) {
        throw new ValidationError(`Chunk size must be a positive integer, got ${resolved.chunkSize}`, {
            field: 'chunkSize',
        });
    }

    const items = parseCslSource(source);
    const chunks = Math.ceil(items.length / resolved.chunkSize);
    const publications: Publication[] = [];
    let committed = 0;

    for (let chunk = 0; chunk < chunks; chunk++) {
        const start = chunk * resolved.chunkSize;
        const batch = items.slice(start, start + resolved.chunkSize);
        const comment = resolved.comment ?? `Import CSL-JSON items ${start + 1}-${start + batch.length} of ${items.length}`;

        try {
            const imported = store.revisions.run({ actor: resolved.actor, comment }, (scope) =>
                batch.map((item) => importCslItem(store, scope, item, resolved))
            );
            publications.push(...imported);
            committed++;
            getLogger().info({ chunk: chunk + 1, size: batch.length, committed }, 'CSL-JSON chunk committed');
        } catch (error) {
            getLogger().error(
                { chunk: chunk + 1, committed, err: error instanceof Error ? error.message : String(error) },
                'CSL-JSON chunk rolled back'
            );
            throw error;
        }
    }

    return publications;
}

function importCslItem(store: CuratorStore, scope: RevisionScope, item: CslItem, options: ResolvedOptions): Publication {
    const mapped = mapCslItem(item);
    const doi = mapped.fields.doi;
    const existing = doi ? store.publications.findByDoi(doi) : undefined;
    if (existing) {
        return applyToExisting(store, scope, existing, mapped, options);
    }

    const authors = resolveAuthors(store, scope, mapped);
    const slug = chooseSlug(slugBase(authors.slugSurnames, mapped.fields.year), (candidate) =>
        store.publications.slugTaken(candidate)
    );
    const created = store.publications.create({ ...mapped.fields, slug });
    scope.created(publicationRef(created));
    store.publications.replaceAuthorships(created.publication_id, authors.authorships);
    tagResidualFields(store, created, mapped, options);

    // An earlier batch may hold the same work under the undisambiguated slug.
    const twin = store.publications.findByTitleAndSlug(
        created.title,
        stripDisambiguation(created.slug),
        created.publication_id
    );
    if (!twin) {
        getLogger().debug({ slug }, 'Publication created from CSL-JSON');
        return created;
    }

    getLogger().info({ discarded: created.slug, kept: twin.slug }, 'Duplicate publication folded into earlier import');
    store.publications.delete(created.publication_id);
    const updated = applyToExisting(store, scope, twin, mapped, options);
    dropUnreferencedPeople(store, authors.createdPeople);
    return updated;
}

function applyToExisting(
    store: CuratorStore,
    scope: RevisionScope,
    existing: Publication,
    mapped: MappedEntry,
    options: ResolvedOptions
): Publication {
    const id = existing.publication_id;
    scope.touch(publicationRef(existing));

    const authors = options.updateAuthors ? resolveAuthors(store, scope, mapped) : undefined;
    const changes: Partial<PublicationInput> = { ...mapped.fields };

    if (options.regenerateSlugs) {
        const surnames = authors?.slugSurnames ?? storedSlugSurnames(store, id);
        changes.slug = chooseSlug(slugBase(surnames, mapped.fields.year), (candidate) =>
            store.publications.slugTaken(candidate, id)
        );
    }

    const updated = store.publications.update(id, changes);
    if (authors) {
        store.publications.replaceAuthorships(id, authors.authorships);
    }
    tagResidualFields(store, updated, mapped, options);

    getLogger().debug({ slug: updated.slug }, 'Publication updated from CSL-JSON');
    return updated;
}

function mapCslItem(item: CslItem): MappedEntry {
    const label = String(item.id ?? item.title ?? '(untitled)');

    const type = item.type ?? DEFAULT_CSL_TYPE;
    if (!isCslType(type)) {
        throw new ValidationError(`Entry "${label}" has unknown CSL type "${type}"`, { field: 'type' });
    }

    const names: MappedEntry['names'] = [];
    for (const role of CSL_NAME_ROLES) {
        const list = item[role];
        if (list && list.length > 0) names.push([role, list.map(cslNameToPersonName)]);
    }

    const residual = Object.entries(item).filter(([field]) => !CONSUMED_CSL_FIELDS.has(field));

    return {
        label,
        fields: {
            title: cleanTitle(item.title) || 'Untitled',
            year: extractYear(item, label),
            doi: normalizeDoi(item.DOI),
            url: item.URL?.trim() || null,
            type,
            abstract: item.abstract?.trim() || null,
            source_text: JSON.stringify(item),
        },
        names,
        residual,
    };
}

// ─── Residual fields ─────────────────────────────────────

/**
 * Encode a residual field value as tag text: `list:` and `dict:` prefixes
 * mark JSON-encoded structures, scalars are stored as their text.
 */
export function encodeMetaValue(value: unknown): string {
    if (Array.isArray(value)) return `list:${JSON.stringify(value)}`;
    if (value !== null && typeof value === 'object') return `dict:${JSON.stringify(value)}`;
    return String(value);
}

/**
 * Inverse of `encodeMetaValue`. Scalars come back as strings.
 */
export function decodeMetaValue(text: string): unknown {
    if (text.startsWith('list:') || text.startsWith('dict:')) {
        const decoded: unknown = JSON.parse(text.slice(5));
        return decoded;
    }
    return text;
}

/**
 * Tag key for a field name: anything outside [A-Za-z0-9_] becomes "_".
 */
export function metaKey(field: string): string {
    return field.replace(/[^A-Za-z0-9_]/g, '_');
}

function tagResidualFields(store: CuratorStore, publication: Publication, mapped: MappedEntry, options: ResolvedOptions): void {
    if (!options.tagResidualFields) return;

    const owner = publicationRef(publication);
    store.annotations.clearTags(owner, META_ANNOTATION_TYPE);

    for (const [field, value] of mapped.residual) {
        if (value === undefined || value === null) continue;
        const key = metaKey(field);
        if (key === '') continue;

        try {
            store.annotations.attachTag(owner, {
                type: META_ANNOTATION_TYPE,
                key,
                value: encodeMetaValue(value),
                comment: field,
            });
        } catch (error) {
            if (!(error instanceof UniqueConstraintViolation)) throw error;
            getLogger().warn({ entry: mapped.label, field, key }, 'Residual field collides with another after key cleanup; skipped');
        }
    }
}

// ─── People ──────────────────────────────────────────────

/**
 * Resolve every name to a person by alias, creating people (and their alias)
 * for names seen for the first time. Positions follow source order per role.
 */
function resolveAuthors(store: CuratorStore, scope: RevisionScope, mapped: MappedEntry): ResolvedAuthors {
    const authorships: AuthorshipInput[] = [];
    const surnamesByRole = new Map<string, string[]>();
    const createdPeople: number[] = [];

    for (const [role, names] of mapped.names) {
        const surnames: string[] = [];
        names.forEach((name, position) => {
            const { person, created } = resolvePerson(store, scope, name);
            if (created) createdPeople.push(person.person_id);
            authorships.push({ person_id: person.person_id, role, position });
            surnames.push(person.last_name);
        });
        surnamesByRole.set(role, surnames);
    }

    return { authorships, slugSurnames: pickSlugSurnames(surnamesByRole), createdPeople };
}

function resolvePerson(store: CuratorStore, scope: RevisionScope, name: PersonName): { person: Person; created: boolean } {
    const alias = renderAlias(name);
    const known = store.people.findByAlias(alias);
    if (known) return { person: known, created: false };

    const person = store.people.create(personFields(name));
    store.people.addAlias(person.person_id, alias);
    scope.created({ kind: 'person', id: person.person_id });
    getLogger().debug({ personId: person.person_id, alias }, 'Person created from alias');
    return { person, created: true };
}

/**
 * Delete people created for a discarded publication that nothing references.
 */
function dropUnreferencedPeople(store: CuratorStore, personIds: readonly number[]): void {
    for (const personId of personIds) {
        if (store.people.countAuthorships(personId) > 0 || store.people.countRecordAuthorships(personId) > 0) continue;
        store.people.delete(personId);
        getLogger().debug({ personId }, 'Person dropped with discarded duplicate');
    }
}

function storedSlugSurnames(store: CuratorStore, publicationId: number): string[] {
    const byRole = new Map<string, string[]>([
        ['author', store.publications.surnames(publicationId, 'author')],
        ['editor', store.publications.surnames(publicationId, 'editor')],
    ]);
    return pickSlugSurnames(byRole);
}

function pickSlugSurnames(byRole: Map<string, string[]>): string[] {
    const authors = byRole.get('author') ?? [];
    if (authors.length > 0) return authors;
    return byRole.get('editor') ?? [];
}

// ─── Internal helpers ────────────────────────────────────

function resolveOptions(options: ImportOptions): ResolvedOptions {
    const defaults = DEFAULT_CONFIG.import;
    return {
        actor: options.actor ?? DEFAULT_CONFIG.actor,
        comment: options.comment,
        updateAuthors: options.updateAuthors ?? defaults.updateAuthors,
        regenerateSlugs: options.regenerateSlugs ?? defaults.regenerateSlugs,
        tagResidualFields: options.tagResidualFields ?? defaults.tagResidualFields,
        chunkSize: options.chunkSize ?? defaults.chunkSize,
    };
}

function publicationRef(publication: Publication): EntityRef {
    return { kind: 'publication', id: publication.publication_id };
}

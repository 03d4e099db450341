import type Database from 'better-sqlite3';
import { purgeAnnotations } from '../annotations/store.js';
import { cleanTitle, normalizeDoi } from '../bibliography/citation.js';
import { DEFAULT_CSL_TYPE, isCslType } from '../bibliography/csl-types.js';
import type { Authorship, AuthorshipInput, AuthorshipWithName, Publication, PublicationInput } from '../types/index.js';
import { NotFoundError, ValidationError, guardUnique } from '../utils/errors.js';
import type { CuratorDatabase } from './database.js';
import { requireEntity } from './entity-registry.js';

type PublicationColumns = Omit<Publication, 'publication_id' | 'created_at'>;

/**
 * Publications and their ordered authorships.
 */
export class PublicationRepository {
    private readonly raw: Database.Database;

    constructor(db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    // ─── Publications ─────────────────────────────────────────

    create(input: PublicationInput): Publication {
        const publication = normalizePublication(input);

        const result = guardUnique('publications.slug', `Slug "${publication.slug}" is already taken`, () =>
            this.raw
                .prepare(
                    `INSERT INTO publications (slug, title, year, doi, url, type, abstract, source_text)
                     VALUES (@slug, @title, @year, @doi, @url, @type, @abstract, @source_text)`
                )
                .run(publication)
        );

        return this.get(Number(result.lastInsertRowid));
    }

    update(publicationId: number, changes: Partial<PublicationInput>): Publication {
        const current = this.get(publicationId);
        const publication = normalizePublication({ ...current, ...changes });

        guardUnique('publications.slug', `Slug "${publication.slug}" is already taken`, () =>
            this.raw
                .prepare(
                    `UPDATE publications
                     SET slug = @slug, title = @title, year = @year, doi = @doi, url = @url,
                         type = @type, abstract = @abstract, source_text = @source_text
                     WHERE publication_id = @publication_id`
                )
                .run({ ...publication, publication_id: publicationId })
        );

        return this.get(publicationId);
    }

    find(publicationId: number): Publication | undefined {
        return this.raw
            .prepare<[number], Publication>('SELECT * FROM publications WHERE publication_id = ?')
            .get(publicationId);
    }

    get(publicationId: number): Publication {
        const publication = this.find(publicationId);
        if (!publication) throw new NotFoundError('publication', publicationId);
        return publication;
    }

    findBySlug(slug: string): Publication | undefined {
        return this.raw.prepare<[string], Publication>('SELECT * FROM publications WHERE slug = ?').get(slug);
    }

    getBySlug(slug: string): Publication {
        const publication = this.findBySlug(slug);
        if (!publication) throw new NotFoundError('publication', slug);
        return publication;
    }

    /**
     * Oldest publication carrying this DOI (compared after normalization).
     */
    findByDoi(doi: string): Publication | undefined {
        const normalized = normalizeDoi(doi);
        if (normalized === null) return undefined;
        return this.raw
            .prepare<[string], Publication>('SELECT * FROM publications WHERE doi = ? ORDER BY publication_id LIMIT 1')
            .get(normalized);
    }

    /**
     * True when another publication (not `excludeId`) already uses `slug`.
     */
    slugTaken(slug: string, excludeId?: number): boolean {
        const row = this.raw
            .prepare<[string, number], { found: number }>(
                'SELECT 1 as found FROM publications WHERE slug = ? AND publication_id != ?'
            )
            .get(slug, excludeId ?? -1);
        return row !== undefined;
    }

    /**
     * A publication other than `excludeId` with exactly this title and slug.
     */
    findByTitleAndSlug(title: string, slug: string, excludeId: number): Publication | undefined {
        return this.raw
            .prepare<[string, string, number], Publication>(
                'SELECT * FROM publications WHERE title = ? AND slug = ? AND publication_id != ?'
            )
            .get(title, slug, excludeId);
    }

    list(): Publication[] {
        return this.raw.prepare<[], Publication>('SELECT * FROM publications ORDER BY year, slug').all();
    }

    /**
     * Delete a publication. Its authorships and record references go with it.
     */
    delete(publicationId: number): void {
        this.get(publicationId);
        this.raw.prepare('DELETE FROM publications WHERE publication_id = ?').run(publicationId);
        purgeAnnotations(this.raw, { kind: 'publication', id: publicationId });
    }

    // ─── Authorships ──────────────────────────────────────────

    /**
     * Authorships with the person's name, ordered by role then position.
     */
    listAuthorships(publicationId: number): AuthorshipWithName[] {
        return this.raw
            .prepare<[number], AuthorshipWithName>(
                `SELECT a.*, p.last_name, p.given_names, p.suffix
                 FROM authorships a
                 JOIN people p ON p.person_id = a.person_id
                 WHERE a.publication_id = ?
                 ORDER BY a.role, a.position, a.authorship_id`
            )
            .all(publicationId);
    }

    addAuthorship(publicationId: number, input: AuthorshipInput): Authorship {
        this.get(publicationId);
        const role = input.role.trim();
        if (role === '') {
            throw new ValidationError('Authorship role must not be empty', { field: 'role' });
        }
        requireEntity(this.raw, { kind: 'person', id: input.person_id });

        const result = this.raw
            .prepare('INSERT INTO authorships (publication_id, person_id, role, position) VALUES (?, ?, ?, ?)')
            .run(publicationId, input.person_id, role, input.position);

        return {
            authorship_id: Number(result.lastInsertRowid),
            publication_id: publicationId,
            person_id: input.person_id,
            role,
            position: input.position,
        };
    }

    /**
     * Delete every authorship of the publication and insert `authorships` in their place.
     */
    replaceAuthorships(publicationId: number, authorships: readonly AuthorshipInput[]): Authorship[] {
        this.raw.prepare('DELETE FROM authorships WHERE publication_id = ?').run(publicationId);
        return authorships.map((authorship) => this.addAuthorship(publicationId, authorship));
    }

    /**
     * Ordered last names for one role, used for citation text and slugs.
     */
    surnames(publicationId: number, role = 'author'): string[] {
        return this.raw
            .prepare<[number, string], { last_name: string }>(
                `SELECT p.last_name FROM authorships a
                 JOIN people p ON p.person_id = a.person_id
                 WHERE a.publication_id = ? AND a.role = ?
                 ORDER BY a.position, a.authorship_id`
            )
            .all(publicationId, role)
            .map((row) => row.last_name);
    }
}

function normalizePublication(input: PublicationInput): PublicationColumns {
    const slug = input.slug.trim();
    if (slug === '') {
        throw new ValidationError('A publication needs a slug', { field: 'slug' });
    }
    if (!Number.isInteger(input.year)) {
        throw new ValidationError(`Year must be an integer, got ${input.year}`, { field: 'year' });
    }

    const type = input.type ?? DEFAULT_CSL_TYPE;
    if (!isCslType(type)) {
        throw new ValidationError(`"${type}" is not a CSL item type`, { field: 'type' });
    }

    return {
        slug,
        title: cleanTitle(input.title) || 'Untitled',
        year: input.year,
        doi: normalizeDoi(input.doi),
        url: input.url?.trim() || null,
        type,
        abstract: input.abstract?.trim() || null,
        source_text: input.source_text ?? '',
    };
}

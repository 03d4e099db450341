import type Database from 'better-sqlite3';
import { z } from 'zod';
import { purgeAnnotations } from '../annotations/store.js';
import type { Alias, ContactInfo, ContactInfoInput, Person, PersonInput } from '../types/index.js';
import { NotFoundError, UniqueConstraintViolation, ValidationError, guardUnique } from '../utils/errors.js';
import type { CuratorDatabase } from './database.js';

const ORCID_PATTERN = /^\d{4}-\d{4}-\d{4}-\d{3}[\dX]$/;

const ContactInfoSchema = z.object({
    updated: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be an ISO date (YYYY-MM-DD)'),
    email: z.union([z.string().email(), z.literal('')]).default(''),
    telephone: z.string().max(55).default(''),
    address: z.string().default(''),
});

/**
 * Counts of dependent rows moved by `reassignDependents()`.
 */
export interface ReassignResult {
    aliases: number;
    authorships: number;
    recordAuthorships: number;
    contacts: number;
}

/**
 * "Given Last", or just the last name when no given names are known.
 */
export function formatPersonName(person: Pick<Person, 'given_names' | 'last_name'>): string {
    return person.given_names ? `${person.given_names} ${person.last_name}` : person.last_name;
}

/**
 * People, their aliases and their contact info.
 */
export class PeopleRepository {
    private readonly raw: Database.Database;

    constructor(db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    // ─── People ───────────────────────────────────────────────

    create(input: PersonInput): Person {
        const person = normalizePerson(input);

        const result = guardUnique('people.orcid', `ORCID ${person.orcid ?? ''} is already assigned`, () =>
            this.raw
                .prepare(
                    `INSERT INTO people (given_names, last_name, suffix, orcid)
                     VALUES (@given_names, @last_name, @suffix, @orcid)`
                )
                .run(person)
        );

        return this.get(Number(result.lastInsertRowid));
    }

    update(personId: number, changes: Partial<PersonInput>): Person {
        const current = this.get(personId);
        const person = normalizePerson({ ...current, ...changes });

        guardUnique('people.orcid', `ORCID ${person.orcid ?? ''} is already assigned`, () =>
            this.raw
                .prepare(
                    `UPDATE people SET given_names = @given_names, last_name = @last_name, suffix = @suffix, orcid = @orcid
                     WHERE person_id = @person_id`
                )
                .run({ ...person, person_id: personId })
        );

        return this.get(personId);
    }

    find(personId: number): Person | undefined {
        return this.raw.prepare<[number], Person>('SELECT * FROM people WHERE person_id = ?').get(personId);
    }

    get(personId: number): Person {
        const person = this.find(personId);
        if (!person) throw new NotFoundError('person', personId);
        return person;
    }

    findByOrcid(orcid: string): Person | undefined {
        return this.raw.prepare<[string], Person>('SELECT * FROM people WHERE orcid = ?').get(orcid);
    }

    list(): Person[] {
        return this.raw.prepare<[], Person>('SELECT * FROM people ORDER BY last_name, given_names, person_id').all();
    }

    /**
     * Delete a person. Fails while any publication or record still names them.
     */
    delete(personId: number): void {
        this.get(personId);

        const authorships = this.countAuthorships(personId);
        const recordAuthorships = this.countRecordAuthorships(personId);
        if (authorships > 0 || recordAuthorships > 0) {
            throw new ValidationError(
                `Person ${personId} is still referenced by ${authorships} authorship(s) and ${recordAuthorships} record authorship(s)`
            );
        }

        this.raw.prepare('DELETE FROM people WHERE person_id = ?').run(personId);
        purgeAnnotations(this.raw, { kind: 'person', id: personId });
    }

    countAuthorships(personId: number): number {
        return this.count('SELECT COUNT(*) as count FROM authorships WHERE person_id = ?', personId);
    }

    countRecordAuthorships(personId: number): number {
        return this.count('SELECT COUNT(*) as count FROM record_authorships WHERE person_id = ?', personId);
    }

    // ─── Aliases ──────────────────────────────────────────────

    /**
     * Register `alias` for a person. Re-adding a person's own alias returns
     * the existing row; an alias owned by anyone else fails.
     */
    addAlias(personId: number, alias: string): Alias {
        this.get(personId);
        const text = alias.trim();
        if (text === '') {
            throw new ValidationError('Alias must not be empty', { field: 'alias' });
        }

        const existing = this.raw.prepare<[string], Alias>('SELECT * FROM aliases WHERE alias = ?').get(text);
        if (existing) {
            if (existing.person_id === personId) return existing;
            throw new UniqueConstraintViolation(
                `Alias "${text}" already belongs to person ${existing.person_id}`,
                'aliases.alias'
            );
        }

        const result = guardUnique('aliases.alias', `Alias "${text}" is already taken`, () =>
            this.raw.prepare('INSERT INTO aliases (person_id, alias) VALUES (?, ?)').run(personId, text)
        );

        return { alias_id: Number(result.lastInsertRowid), person_id: personId, alias: text };
    }

    findByAlias(alias: string): Person | undefined {
        return this.raw
            .prepare<[string], Person>(
                'SELECT people.* FROM aliases JOIN people ON people.person_id = aliases.person_id WHERE aliases.alias = ?'
            )
            .get(alias.trim());
    }

    listAliases(personId: number): Alias[] {
        return this.raw.prepare<[number], Alias>('SELECT * FROM aliases WHERE person_id = ? ORDER BY alias').all(personId);
    }

    removeAlias(aliasId: number): boolean {
        return this.raw.prepare('DELETE FROM aliases WHERE alias_id = ?').run(aliasId).changes > 0;
    }

    // ─── Contact info ─────────────────────────────────────────

    addContactInfo(personId: number, input: ContactInfoInput): ContactInfo {
        this.get(personId);

        const parsed = ContactInfoSchema.safeParse(input);
        if (!parsed.success) {
            throw new ValidationError('Invalid contact info', {
                issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
            });
        }

        const result = this.raw
            .prepare(
                `INSERT INTO contact_info (person_id, updated, email, telephone, address)
                 VALUES (@person_id, @updated, @email, @telephone, @address)`
            )
            .run({ ...parsed.data, person_id: personId });

        return { ...parsed.data, person_id: personId, contact_id: Number(result.lastInsertRowid) };
    }

    listContactInfo(personId: number): ContactInfo[] {
        return this.raw
            .prepare<[number], ContactInfo>('SELECT * FROM contact_info WHERE person_id = ? ORDER BY updated DESC, contact_id')
            .all(personId);
    }

    removeContactInfo(contactId: number): boolean {
        return this.raw.prepare('DELETE FROM contact_info WHERE contact_id = ?').run(contactId).changes > 0;
    }

    // ─── Merging ──────────────────────────────────────────────

    /**
     * Point every alias, authorship, record authorship and contact row of
     * `fromId` at `toId`.
     */
    reassignDependents(fromId: number, toId: number): ReassignResult {
        const move = (table: string): number =>
            this.raw.prepare(`UPDATE ${table} SET person_id = ? WHERE person_id = ?`).run(toId, fromId).changes;

        return {
            aliases: move('aliases'),
            authorships: move('authorships'),
            recordAuthorships: move('record_authorships'),
            contacts: move('contact_info'),
        };
    }

    private count(sql: string, personId: number): number {
        return this.raw.prepare<[number], { count: number }>(sql).get(personId)?.count ?? 0;
    }
}

function normalizePerson(input: PersonInput): Omit<Person, 'person_id' | 'created_at'> {
    const lastName = input.last_name.trim();
    if (lastName === '') {
        throw new ValidationError('A person needs a last name', { field: 'last_name' });
    }

    const orcid = input.orcid?.trim() || null;
    if (orcid !== null && !ORCID_PATTERN.test(orcid)) {
        throw new ValidationError(`"${orcid}" is not an ORCID iD`, { field: 'orcid' });
    }

    return {
        given_names: input.given_names?.trim() ?? '',
        last_name: lastName,
        suffix: input.suffix?.trim() ?? '',
        orcid,
    };
}

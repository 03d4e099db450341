import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CuratorDatabase } from '../storage/database.js';
import { createStore, formatPersonName, type CuratorStore } from '../storage/index.js';
import { NotFoundError, UniqueConstraintViolation, ValidationError } from '../utils/errors.js';

describe('PeopleRepository', () => {
    let store: CuratorStore;

    beforeEach(() => {
        store = createStore(new CuratorDatabase(':memory:'));
    });

    afterEach(() => {
        store.db.close();
    });

    describe('people', () => {
        it('should create and read a person', () => {
            const person = store.people.create({ given_names: ' Jane ', last_name: ' Smith ', orcid: '0000-0002-1825-0097' });

            expect(store.people.get(person.person_id)).toMatchObject({
                given_names: 'Jane',
                last_name: 'Smith',
                suffix: '',
                orcid: '0000-0002-1825-0097',
            });
        });

        it('should require a last name', () => {
            expect(() => store.people.create({ last_name: '  ' })).toThrow(ValidationError);
        });

        it('should validate and deduplicate ORCID iDs', () => {
            expect(() => store.people.create({ last_name: 'Smith', orcid: '1234' })).toThrow(ValidationError);

            store.people.create({ last_name: 'Smith', orcid: '0000-0002-1825-0097' });
            expect(() => store.people.create({ last_name: 'Jones', orcid: '0000-0002-1825-0097' })).toThrow(
                UniqueConstraintViolation
            );
            expect(store.people.findByOrcid('0000-0002-1825-0097')?.last_name).toBe('Smith');
        });

        it('should store a missing ORCID as null so several people can lack one', () => {
            store.people.create({ last_name: 'Smith', orcid: '' });
            store.people.create({ last_name: 'Jones' });

            expect(store.people.list().map((p) => p.orcid)).toEqual([null, null]);
        });

        it('should update fields', () => {
            const person = store.people.create({ last_name: 'Smith' });
            const updated = store.people.update(person.person_id, { given_names: 'J.', suffix: 'Jr' });

            expect(formatPersonName(updated)).toBe('J. Smith');
            expect(updated.suffix).toBe('Jr');
        });

        it('should throw NotFoundError for unknown ids', () => {
            expect(() => store.people.get(42)).toThrow(NotFoundError);
            expect(() => store.people.get(42)).toThrow('No person with key 42');
        });

        it('should refuse to delete a person who still has authorships', () => {
            const person = store.people.create({ last_name: 'Smith' });
            const publication = store.publications.create({ slug: 'smith19', title: 'Lake levels', year: 2019 });
            store.publications.addAuthorship(publication.publication_id, {
                person_id: person.person_id,
                role: 'author',
                position: 0,
            });

            expect(() => store.people.delete(person.person_id)).toThrow(ValidationError);
            expect(store.people.find(person.person_id)).toBeDefined();
        });

        it('should reject an authorship naming an unknown person', () => {
            const publication = store.publications.create({ slug: 'smith19', title: 'Lake levels', year: 2019 });

            expect(() =>
                store.publications.addAuthorship(publication.publication_id, { person_id: 99, role: 'author', position: 0 })
            ).toThrow(NotFoundError);
            expect(store.publications.listAuthorships(publication.publication_id)).toEqual([]);
        });

        it('should delete a person without dependents, with their aliases', () => {
            const person = store.people.create({ last_name: 'Smith' });
            store.people.addAlias(person.person_id, 'Smith, J.');
            store.people.delete(person.person_id);

            expect(store.people.find(person.person_id)).toBeUndefined();
            expect(store.people.findByAlias('Smith, J.')).toBeUndefined();
        });
    });

    describe('formatPersonName', () => {
        it('should fall back to the last name alone', () => {
            expect(formatPersonName({ given_names: '', last_name: 'IPCC' })).toBe('IPCC');
            expect(formatPersonName({ given_names: 'Jane', last_name: 'Smith' })).toBe('Jane Smith');
        });
    });

    describe('aliases', () => {
        it('should resolve a person by alias', () => {
            const person = store.people.create({ last_name: 'Smith', given_names: 'Jane' });
            store.people.addAlias(person.person_id, 'Smith, Jane');

            expect(store.people.findByAlias('Smith, Jane')?.person_id).toBe(person.person_id);
            expect(store.people.findByAlias('Smith, J.')).toBeUndefined();
        });

        it('should keep the alias-to-person mapping injective', () => {
            const jane = store.people.create({ last_name: 'Smith', given_names: 'Jane' });
            const john = store.people.create({ last_name: 'Smith', given_names: 'John' });
            store.people.addAlias(jane.person_id, 'Smith, J.');

            expect(() => store.people.addAlias(john.person_id, 'Smith, J.')).toThrow(UniqueConstraintViolation);
            expect(store.people.findByAlias('Smith, J.')?.person_id).toBe(jane.person_id);
        });

        it('should return the existing row when a person re-adds their own alias', () => {
            const jane = store.people.create({ last_name: 'Smith' });
            const first = store.people.addAlias(jane.person_id, 'Smith, J.');
            const second = store.people.addAlias(jane.person_id, ' Smith, J. ');

            expect(second.alias_id).toBe(first.alias_id);
            expect(store.people.listAliases(jane.person_id)).toHaveLength(1);
        });

        it('should reject an empty alias', () => {
            const jane = store.people.create({ last_name: 'Smith' });
            expect(() => store.people.addAlias(jane.person_id, ' ')).toThrow(ValidationError);
        });

        it('should remove an alias', () => {
            const jane = store.people.create({ last_name: 'Smith' });
            const alias = store.people.addAlias(jane.person_id, 'Smith, J.');

            expect(store.people.removeAlias(alias.alias_id)).toBe(true);
            expect(store.people.listAliases(jane.person_id)).toEqual([]);
        });
    });

    describe('contact info', () => {
        it('should add and list contact info, newest first', () => {
            const jane = store.people.create({ last_name: 'Smith' });
            store.people.addContactInfo(jane.person_id, { updated: '2018-03-01', email: 'jane@example.org' });
            store.people.addContactInfo(jane.person_id, { updated: '2021-09-15', telephone: '555-0100' });

            const contacts = store.people.listContactInfo(jane.person_id);
            expect(contacts.map((c) => c.updated)).toEqual(['2021-09-15', '2018-03-01']);
            expect(contacts[1]?.email).toBe('jane@example.org');
            expect(contacts[0]?.email).toBe('');
        });

        it('should validate the date and email', () => {
            const jane = store.people.create({ last_name: 'Smith' });
            expect(() => store.people.addContactInfo(jane.person_id, { updated: 'yesterday' })).toThrow(ValidationError);
            expect(() =>
                store.people.addContactInfo(jane.person_id, { updated: '2020-01-01', email: 'not-an-email' })
            ).toThrow(ValidationError);
        });
    });
});

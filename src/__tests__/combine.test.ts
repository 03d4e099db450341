import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { combinePeople } from '../merge/combine.js';
import { CuratorDatabase } from '../storage/database.js';
import { createStore, type CuratorStore } from '../storage/index.js';
import type { Person } from '../types/index.js';
import { NotFoundError, UserError } from '../utils/errors.js';

describe('combinePeople', () => {
    let store: CuratorStore;
    let jane: Person;
    let duplicate: Person;

    function authorOf(person: Person, count: number): void {
        for (let i = 0; i < count; i++) {
            const slug = `p${person.person_id}_${i}`;
            const publication = store.publications.create({ slug, title: `Paper ${slug}`, year: 2000 + i });
            store.publications.addAuthorship(publication.publication_id, {
                person_id: person.person_id,
                role: 'author',
                position: 0,
            });
        }
    }

    beforeEach(() => {
        store = createStore(new CuratorDatabase(':memory:'));
        jane = store.people.create({ given_names: 'Jane', last_name: 'Smith' });
        duplicate = store.people.create({ given_names: 'J.', last_name: 'Smith' });
        authorOf(jane, 3);
        authorOf(duplicate, 1);
    });

    afterEach(() => {
        store.db.close();
    });

    it('should keep the person with the most authorships', () => {
        const result = combinePeople(store, [duplicate.person_id, jane.person_id]);

        if (!result.ok) throw result.error;
        expect(result.survivor.person_id).toBe(jane.person_id);
        expect(result.removed.map((loser) => loser.person.person_id)).toEqual([duplicate.person_id]);
        expect(store.people.find(duplicate.person_id)).toBeUndefined();
        expect(store.people.countAuthorships(jane.person_id)).toBe(4);
    });

    it('should move aliases, record authorships and contact info', () => {
        store.people.addAlias(duplicate.person_id, 'Smith, J.');
        store.people.addContactInfo(duplicate.person_id, { updated: '2020-01-01', email: 'j.smith@example.org' });
        const record = store.records.create({ name: 'MAJ-1', type: 'sediment_core' });
        store.records.addAuthorship(record.record_id, duplicate.person_id, 'collected');

        const result = combinePeople(store, [jane.person_id, duplicate.person_id]);

        if (!result.ok) throw result.error;
        expect(result.removed[0]).toMatchObject({ aliases: 1, authorships: 1, recordAuthorships: 1, contacts: 1 });
        expect(store.people.findByAlias('Smith, J.')?.person_id).toBe(jane.person_id);
        expect(store.people.listContactInfo(jane.person_id).map((c) => c.email)).toEqual(['j.smith@example.org']);
        expect(store.records.listAuthorships(record.record_id)[0]?.person_id).toBe(jane.person_id);
    });

    it("should move annotations and keep the survivor's copy of a shared key", () => {
        const janeRef = { kind: 'person' as const, id: jane.person_id };
        const duplicateRef = { kind: 'person' as const, id: duplicate.person_id };
        store.annotations.attachTag(janeRef, { key: 'affiliation', value: 'Dalhousie' });
        store.annotations.attachTag(duplicateRef, { key: 'affiliation', value: 'Unknown' });
        store.annotations.attachTag(duplicateRef, { key: 'field', value: 'Palynology' });

        const result = combinePeople(store, [jane.person_id, duplicate.person_id]);

        if (!result.ok) throw result.error;
        expect(result.removed[0]).toMatchObject({ annotationsMoved: 1, annotationsDiscarded: 1 });
        expect(store.annotations.listTags(janeRef).map((t) => [t.key, t.value])).toEqual([
            ['affiliation', 'Dalhousie'],
            ['field', 'Palynology'],
        ]);
        expect(store.db.getStats().tags).toBe(2);
    });

    it('should keep the first candidate on a tie', () => {
        const a = store.people.create({ last_name: 'Lee' });
        const b = store.people.create({ last_name: 'Lee' });

        const result = combinePeople(store, [b.person_id, a.person_id]);

        if (!result.ok) throw result.error;
        expect(result.survivor.person_id).toBe(b.person_id);
    });

    it('should record one revision covering every candidate', () => {
        combinePeople(store, [duplicate.person_id, jane.person_id], { actor: 'tester' });

        const [revision] = store.revisions.list();
        expect(revision?.actor).toBe('tester');
        expect(revision?.comment).toBe(`Combine people ${duplicate.person_id}, ${jane.person_id}`);
        expect(revision?.before.map((s) => s.id)).toEqual([jane.person_id, duplicate.person_id]);
        expect(revision?.before[1]?.data).toMatchObject({ given_names: 'J.', last_name: 'Smith' });
        expect(revision?.after[1]?.data).toBeNull();
    });

    it('should return a user error for fewer than two distinct people', () => {
        for (const ids of [[jane.person_id], [jane.person_id, jane.person_id]]) {
            const result = combinePeople(store, ids);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBeInstanceOf(UserError);
                expect(result.error.message).toBe('Select at least two people to combine');
            }
        }
        expect(store.db.getStats()).toMatchObject({ people: 2, revisions: 0 });
    });

    it('should change nothing when a candidate does not exist', () => {
        expect(() => combinePeople(store, [jane.person_id, 999])).toThrow(NotFoundError);
        expect(store.db.getStats()).toMatchObject({ people: 2, revisions: 0 });
    });
});

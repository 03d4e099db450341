import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CuratorDatabase } from '../storage/database.js';
import { createStore, type CuratorStore } from '../storage/index.js';
import { NotFoundError } from '../utils/errors.js';

describe('RevisionLog', () => {
    let store: CuratorStore;

    beforeEach(() => {
        store = createStore(new CuratorDatabase(':memory:'));
    });

    afterEach(() => {
        store.db.close();
    });

    it('should snapshot touched entities before and after the change', () => {
        const person = store.people.create({ given_names: 'Jane', last_name: 'Smith' });
        const ref = { kind: 'person' as const, id: person.person_id };

        const renamed = store.revisions.run({ actor: 'tester', comment: 'Fix spelling' }, (scope) => {
            scope.touch(ref);
            return store.people.update(person.person_id, { last_name: 'Smyth' });
        });

        expect(renamed.last_name).toBe('Smyth');
        const [revision] = store.revisions.list();
        expect(revision).toMatchObject({ actor: 'tester', comment: 'Fix spelling' });
        expect(revision?.before[0]?.data).toMatchObject({ last_name: 'Smith' });
        expect(revision?.after[0]?.data).toMatchObject({ last_name: 'Smyth' });
    });

    it('should keep the first snapshot of an entity touched twice', () => {
        const person = store.people.create({ last_name: 'Smith' });
        const ref = { kind: 'person' as const, id: person.person_id };

        store.revisions.run({ actor: 'tester', comment: 'Two edits' }, (scope) => {
            scope.touch(ref);
            store.people.update(person.person_id, { last_name: 'Smyth' });
            scope.touch(ref);
            store.people.update(person.person_id, { last_name: 'Smythe' });
        });

        const [revision] = store.revisions.list();
        expect(revision?.before).toHaveLength(1);
        expect(revision?.before[0]?.data).toMatchObject({ last_name: 'Smith' });
        expect(revision?.after[0]?.data).toMatchObject({ last_name: 'Smythe' });
    });

    it('should record created entities with no prior state', () => {
        store.revisions.run({ actor: 'tester', comment: 'Add parameter' }, (scope) => {
            const parameter = store.parameters.create({ name: 'Loss on ignition', slug: 'loi' });
            scope.created({ kind: 'parameter', id: parameter.parameter_id });
        });

        const [revision] = store.revisions.list();
        expect(revision?.before).toEqual([{ kind: 'parameter', id: 1, data: null }]);
        expect(revision?.after[0]?.data).toMatchObject({ slug: 'loi' });
    });

    it('should roll back the work and the revision on error', () => {
        const person = store.people.create({ last_name: 'Smith' });

        expect(() =>
            store.revisions.run({ actor: 'tester', comment: 'Doomed' }, (scope) => {
                scope.touch({ kind: 'person', id: person.person_id });
                store.people.update(person.person_id, { last_name: 'Smyth' });
                throw new Error('abort');
            })
        ).toThrow('abort');

        expect(store.people.get(person.person_id).last_name).toBe('Smith');
        expect(store.revisions.list()).toEqual([]);
    });

    it('should list newest first and honour the limit', () => {
        for (const comment of ['one', 'two', 'three']) {
            store.revisions.run({ actor: 'tester', comment }, () => undefined);
        }

        expect(store.revisions.list().map((r) => r.comment)).toEqual(['three', 'two', 'one']);
        expect(store.revisions.list(1).map((r) => r.comment)).toEqual(['three']);
    });

    it('should get a revision by id', () => {
        store.revisions.run({ actor: 'tester', comment: 'only' }, () => undefined);

        expect(store.revisions.get(1).comment).toBe('only');
        expect(() => store.revisions.get(2)).toThrow(NotFoundError);
    });
});

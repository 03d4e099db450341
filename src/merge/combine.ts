import type { CuratorStore } from '../storage/index.js';
import { formatPersonName } from '../storage/people.js';
import { DEFAULT_CONFIG, type Person } from '../types/index.js';
import { UserError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface CombineOptions {
    actor?: string;
    comment?: string;
}

/**
 * What moved from one removed person onto the survivor.
 */
export interface CombinedLoser {
    person: Person;
    aliases: number;
    authorships: number;
    recordAuthorships: number;
    contacts: number;
    annotationsMoved: number;
    annotationsDiscarded: number;
}

export type CombineResult =
    | { ok: true; survivor: Person; removed: CombinedLoser[] }
    | { ok: false; error: UserError };

/**
 * Merge duplicate people into one.
 *
 * The survivor is the candidate with the most publication authorships (the
 * earliest in `personIds` on a tie). Every other candidate's aliases,
 * authorships, record authorships and contact info move to the survivor;
 * its tags and attachments move too unless the survivor already has the
 * same (type, key), in which case the survivor's copy is kept. The other
 * candidates are then deleted. All of it is one audited transaction.
 *
 * Fewer than two distinct people is a user error, returned rather than thrown.
 */
export function combinePeople(store: CuratorStore, personIds: readonly number[], options: CombineOptions = {}): CombineResult {
    const ids = [...new Set(personIds)];
    if (ids.length < 2) {
        return { ok: false, error: new UserError('Select at least two people to combine') };
    }

    const comment = options.comment ?? `Combine people ${ids.join(', ')}`;

    return store.revisions.run<CombineResult>({ actor: options.actor ?? DEFAULT_CONFIG.actor, comment }, (scope) => {
        const candidates = ids.map((id) => ({
            person: store.people.get(id),
            authorships: store.people.countAuthorships(id),
        }));

        const keep = candidates.reduce((best, candidate) =>
            candidate.authorships > best.authorships ? candidate : best
        ).person;
        const survivorRef = { kind: 'person' as const, id: keep.person_id };
        scope.touch(survivorRef);

        const removed: CombinedLoser[] = [];
        for (const { person } of candidates) {
            if (person.person_id === keep.person_id) continue;
            const loserRef = { kind: 'person' as const, id: person.person_id };
            scope.touch(loserRef);

            const moved = store.people.reassignDependents(person.person_id, keep.person_id);
            const annotations = store.annotations.transfer(loserRef, survivorRef);
            store.people.delete(person.person_id);

            removed.push({
                person,
                ...moved,
                annotationsMoved: annotations.moved,
                annotationsDiscarded: annotations.discarded,
            });
        }

        const result = store.people.get(keep.person_id);
        getLogger().info(
            {
                survivor: result.person_id,
                removed: removed.map((loser) => loser.person.person_id),
            },
            `Combined ${removed.length + 1} people into ${formatPersonName(result)}`
        );
        return { ok: true, survivor: result, removed };
    });
}

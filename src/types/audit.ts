import type { EntityKind } from './annotation.js';

/**
 * State of one entity captured at a revision boundary.
 * `data` is null when the entity did not exist (before a create, after a delete).
 */
export interface Snapshot {
    kind: EntityKind;
    id: number;
    data: { [column: string]: unknown } | null;
}

/**
 * Who made a change and why.
 */
export interface RevisionMeta {
    actor: string;
    comment: string;
}

/**
 * Row of the append-only `revisions` table.
 */
export interface Revision extends RevisionMeta {
    revision_id: number;
    created_at: string;
    before: Snapshot[];
    after: Snapshot[];
}

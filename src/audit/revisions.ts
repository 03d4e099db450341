import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { CuratorDatabase } from '../storage/database.js';
import { loadEntityRow } from '../storage/entity-registry.js';
import { ENTITY_KINDS, type EntityRef, type Revision, type RevisionMeta, type Snapshot } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const SnapshotSchema = z.object({
    kind: z.enum(ENTITY_KINDS),
    id: z.number().int(),
    data: z.record(z.unknown()).nullable(),
});

const SnapshotListSchema = z.array(SnapshotSchema);

interface RevisionRow {
    revision_id: number;
    created_at: string;
    actor: string;
    comment: string;
    before_json: string;
    after_json: string;
}

/**
 * Collects the entities one mutating operation touches.
 * The first `touch` of a reference records its state before the change.
 */
export class RevisionScope {
    private readonly before = new Map<string, Snapshot>();

    constructor(private readonly raw: Database.Database) {}

    touch(ref: EntityRef): void {
        const key = `${ref.kind}:${ref.id}`;
        if (this.before.has(key)) return;
        this.before.set(key, { kind: ref.kind, id: ref.id, data: loadEntityRow(this.raw, ref) ?? null });
    }

    /**
     * Mark an entity this operation inserted; it had no prior state.
     */
    created(ref: EntityRef): void {
        const key = `${ref.kind}:${ref.id}`;
        if (!this.before.has(key)) {
            this.before.set(key, { kind: ref.kind, id: ref.id, data: null });
        }
    }

    snapshotsBefore(): Snapshot[] {
        return [...this.before.values()];
    }

    snapshotsAfter(): Snapshot[] {
        return this.snapshotsBefore().map(({ kind, id }) => ({
            kind,
            id,
            data: loadEntityRow(this.raw, { kind, id }) ?? null,
        }));
    }
}

/**
 * Append-only audit log. Every mutating operation runs through `run()`,
 * which makes it one transaction and one revision.
 */
export class RevisionLog {
    private readonly raw: Database.Database;

    constructor(private readonly db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    /**
     * Run `fn` atomically and record a revision with before/after snapshots
     * of every entity it touched. A throw rolls back the work and the revision.
     */
    run<T>(meta: RevisionMeta, fn: (scope: RevisionScope) => T): T {
        return this.db.transaction(() => {
            const scope = new RevisionScope(this.raw);
            const result = fn(scope);

            const before = scope.snapshotsBefore();
            const after = scope.snapshotsAfter();
            const info = this.raw
                .prepare(
                    `INSERT INTO revisions (created_at, actor, comment, before_json, after_json)
                     VALUES (?, ?, ?, ?, ?)`
                )
                .run(new Date().toISOString(), meta.actor, meta.comment, JSON.stringify(before), JSON.stringify(after));

            getLogger().debug({ revisionId: Number(info.lastInsertRowid), actor: meta.actor, touched: before.length }, 'Revision recorded');
            return result;
        });
    }

    get(revisionId: number): Revision {
        const row = this.raw
            .prepare<[number], RevisionRow>('SELECT * FROM revisions WHERE revision_id = ?')
            .get(revisionId);
        if (!row) throw new NotFoundError('revision', revisionId);
        return toRevision(row);
    }

    /**
     * Most recent revisions first.
     */
    list(limit = 20): Revision[] {
        return this.raw
            .prepare<[number], RevisionRow>('SELECT * FROM revisions ORDER BY revision_id DESC LIMIT ?')
            .all(limit)
            .map(toRevision);
    }
}

function toRevision(row: RevisionRow): Revision {
    return {
        revision_id: row.revision_id,
        created_at: row.created_at,
        actor: row.actor,
        comment: row.comment,
        before: SnapshotListSchema.parse(JSON.parse(row.before_json)),
        after: SnapshotListSchema.parse(JSON.parse(row.after_json)),
    };
}

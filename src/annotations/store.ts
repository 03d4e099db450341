import type Database from 'better-sqlite3';
import type { CuratorDatabase } from '../storage/database.js';
import { entityExists } from '../storage/entity-registry.js';
import {
    DEFAULT_ANNOTATION_TYPE,
    type Attachment,
    type AttachmentInput,
    type EntityRef,
    type Tag,
    type TagInput,
} from '../types/index.js';
import { NotFoundError, UniqueConstraintViolation, ValidationError, guardUnique } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const KEY_PATTERN = /^[A-Za-z0-9_]+$/;

type AnnotationTable = 'tags' | 'attachments';

/**
 * Outcome of moving one owner's annotations onto another.
 */
export interface TransferResult {
    moved: number;
    discarded: number;
}

/**
 * Throw ValidationError unless `key` only holds alphanumerics or the underscore.
 */
export function validateAnnotationKey(key: string, field: 'key' | 'type' = 'key'): void {
    if (!KEY_PATTERN.test(key)) {
        throw new ValidationError(`Annotation ${field} "${key}" must only contain alphanumerics or the underscore`, { field });
    }
}

/**
 * Delete every tag and attachment owned by `owner`.
 * Called by repositories when the owning entity is deleted.
 */
export function purgeAnnotations(db: Database.Database, owner: EntityRef): void {
    for (const table of ['tags', 'attachments'] as const) {
        db.prepare(`DELETE FROM ${table} WHERE owner_kind = ? AND owner_id = ?`).run(owner.kind, owner.id);
    }
}

/**
 * Generic key/value (Tag) and key/file (Attachment) store attachable to any entity kind.
 * Each (owner, type, key) appears at most once per table.
 */
export class AnnotationStore {
    private readonly raw: Database.Database;

    constructor(private readonly db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    // ─── Tags ─────────────────────────────────────────────────

    attachTag(owner: EntityRef, input: TagInput): Tag {
        const type = input.type ?? DEFAULT_ANNOTATION_TYPE;
        this.checkWrite('tags', owner, type, input.key);

        const tag: Tag = {
            owner_kind: owner.kind,
            owner_id: owner.id,
            type,
            key: input.key,
            value: input.value,
            comment: input.comment ?? '',
        };

        const result = guardUnique('tags.owner_type_key', this.duplicateMessage(owner, type, input.key), () =>
            this.raw
                .prepare(
                    `INSERT INTO tags (owner_kind, owner_id, type, key, value, comment)
                     VALUES (@owner_kind, @owner_id, @type, @key, @value, @comment)`
                )
                .run(tag)
        );

        return { ...tag, tag_id: Number(result.lastInsertRowid) };
    }

    listTags(owner: EntityRef, type?: string): Tag[] {
        return this.list<Tag>('tags', owner, type);
    }

    getTag(owner: EntityRef, type: string, key: string): Tag | undefined {
        return this.raw
            .prepare<[string, number, string, string], Tag>(
                'SELECT * FROM tags WHERE owner_kind = ? AND owner_id = ? AND type = ? AND key = ?'
            )
            .get(owner.kind, owner.id, type, key);
    }

    deleteTag(owner: EntityRef, type: string, key: string): boolean {
        return this.remove('tags', owner, type, key);
    }

    /**
     * Delete every tag of one type on `owner`. Returns the number removed.
     */
    clearTags(owner: EntityRef, type: string): number {
        return this.raw
            .prepare('DELETE FROM tags WHERE owner_kind = ? AND owner_id = ? AND type = ?')
            .run(owner.kind, owner.id, type).changes;
    }

    // ─── Attachments ──────────────────────────────────────────

    attachFile(owner: EntityRef, input: AttachmentInput): Attachment {
        const type = input.type ?? DEFAULT_ANNOTATION_TYPE;
        this.checkWrite('attachments', owner, type, input.key);
        if (input.file.trim() === '') {
            throw new ValidationError('Attachment file reference must not be empty', { field: 'file' });
        }

        const attachment: Attachment = {
            owner_kind: owner.kind,
            owner_id: owner.id,
            type,
            key: input.key,
            file: input.file,
            comment: input.comment ?? '',
        };

        const result = guardUnique('attachments.owner_type_key', this.duplicateMessage(owner, type, input.key), () =>
            this.raw
                .prepare(
                    `INSERT INTO attachments (owner_kind, owner_id, type, key, file, comment)
                     VALUES (@owner_kind, @owner_id, @type, @key, @file, @comment)`
                )
                .run(attachment)
        );

        return { ...attachment, attachment_id: Number(result.lastInsertRowid) };
    }

    listAttachments(owner: EntityRef, type?: string): Attachment[] {
        return this.list<Attachment>('attachments', owner, type);
    }

    deleteAttachment(owner: EntityRef, type: string, key: string): boolean {
        return this.remove('attachments', owner, type, key);
    }

    // ─── Ownership changes ────────────────────────────────────

    /**
     * Move every tag and attachment from `from` to `to`.
     * Where `to` already has the same (type, key), its entry is kept and the
     * one on `from` is deleted.
     */
    transfer(from: EntityRef, to: EntityRef): TransferResult {
        return this.db.transaction(() => {
            const result: TransferResult = { moved: 0, discarded: 0 };

            for (const table of ['tags', 'attachments'] as const) {
                const discarded = this.raw
                    .prepare(
                        `DELETE FROM ${table}
                         WHERE owner_kind = @fromKind AND owner_id = @fromId
                           AND EXISTS (
                             SELECT 1 FROM ${table} AS kept
                             WHERE kept.owner_kind = @toKind AND kept.owner_id = @toId
                               AND kept.type = ${table}.type AND kept.key = ${table}.key
                           )`
                    )
                    .run({ fromKind: from.kind, fromId: from.id, toKind: to.kind, toId: to.id }).changes;

                const moved = this.raw
                    .prepare(
                        `UPDATE ${table} SET owner_kind = @toKind, owner_id = @toId
                         WHERE owner_kind = @fromKind AND owner_id = @fromId`
                    )
                    .run({ fromKind: from.kind, fromId: from.id, toKind: to.kind, toId: to.id }).changes;

                result.discarded += discarded;
                result.moved += moved;
            }

            getLogger().debug({ from, to, ...result }, 'Annotations transferred');
            return result;
        });
    }

    purge(owner: EntityRef): void {
        purgeAnnotations(this.raw, owner);
    }

    // ─── Internal helpers ─────────────────────────────────────

    private checkWrite(table: AnnotationTable, owner: EntityRef, type: string, key: string): void {
        validateAnnotationKey(type, 'type');
        validateAnnotationKey(key, 'key');

        if (!entityExists(this.raw, owner)) {
            throw new NotFoundError(owner.kind, owner.id);
        }

        const existing = this.raw
            .prepare<[string, number, string, string], { found: number }>(
                `SELECT 1 as found FROM ${table} WHERE owner_kind = ? AND owner_id = ? AND type = ? AND key = ?`
            )
            .get(owner.kind, owner.id, type, key);
        if (existing) {
            throw new UniqueConstraintViolation(this.duplicateMessage(owner, type, key), `${table}.owner_type_key`);
        }
    }

    private list<T>(table: AnnotationTable, owner: EntityRef, type?: string): T[] {
        if (type === undefined) {
            return this.raw
                .prepare<[string, number], T>(`SELECT * FROM ${table} WHERE owner_kind = ? AND owner_id = ? ORDER BY type, key`)
                .all(owner.kind, owner.id);
        }
        return this.raw
            .prepare<[string, number, string], T>(
                `SELECT * FROM ${table} WHERE owner_kind = ? AND owner_id = ? AND type = ? ORDER BY key`
            )
            .all(owner.kind, owner.id, type);
    }

    private remove(table: AnnotationTable, owner: EntityRef, type: string, key: string): boolean {
        const result = this.raw
            .prepare(`DELETE FROM ${table} WHERE owner_kind = ? AND owner_id = ? AND type = ? AND key = ?`)
            .run(owner.kind, owner.id, type, key);
        return result.changes > 0;
    }

    private duplicateMessage(owner: EntityRef, type: string, key: string): string {
        return `${owner.kind} ${owner.id} already has a ${type} annotation with key "${key}"`;
    }
}

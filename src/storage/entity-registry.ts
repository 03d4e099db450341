import type Database from 'better-sqlite3';
import { ENTITY_KINDS, type EntityKind, type EntityRef } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

/**
 * Stored row of any entity table, keyed by column name.
 */
export type Row = { [column: string]: unknown };

/**
 * Dispatch table from entity kind to the table that stores it.
 * Polymorphic references (annotations, revisions) resolve through here
 * instead of through foreign keys.
 */
const ENTITY_TABLES: { readonly [K in EntityKind]: { table: string; idColumn: string } } = {
    person: { table: 'people', idColumn: 'person_id' },
    publication: { table: 'publications', idColumn: 'publication_id' },
    feature: { table: 'features', idColumn: 'feature_id' },
    record: { table: 'records', idColumn: 'record_id' },
    parameter: { table: 'parameters', idColumn: 'parameter_id' },
};

/**
 * Load the stored row behind a reference, or undefined if it does not exist.
 */
export function loadEntityRow(db: Database.Database, ref: EntityRef): Row | undefined {
    const { table, idColumn } = ENTITY_TABLES[ref.kind];
    return db.prepare<[number], Row>(`SELECT * FROM ${table} WHERE ${idColumn} = ?`).get(ref.id);
}

export function entityExists(db: Database.Database, ref: EntityRef): boolean {
    const { table, idColumn } = ENTITY_TABLES[ref.kind];
    return db.prepare<[number], { found: number }>(`SELECT 1 as found FROM ${table} WHERE ${idColumn} = ?`).get(ref.id) !== undefined;
}

/**
 * Throw NotFoundError unless the referenced row exists.
 */
export function requireEntity(db: Database.Database, ref: EntityRef): void {
    if (!entityExists(db, ref)) throw new NotFoundError(ref.kind, ref.id);
}

/**
 * Narrow user input (e.g. a CLI argument) to an EntityKind.
 */
export function parseEntityKind(value: string): EntityKind | undefined {
    return ENTITY_KINDS.find((kind) => kind === value.toLowerCase());
}

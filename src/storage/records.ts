import type Database from 'better-sqlite3';
import { purgeAnnotations } from '../annotations/store.js';
import { computeGeoFields } from '../geometry/geo-fields.js';
import {
    RECORD_AUTHOR_ROLES,
    RECORD_MEDIA,
    RECORD_REFERENCE_TYPES,
    RECORD_RESOLUTIONS,
    RECORD_TYPES,
    type RecordAuthorRole,
    type RecordAuthorship,
    type RecordInput,
    type RecordParameter,
    type RecordParameterInput,
    type RecordReference,
    type RecordReferenceType,
    type ResearchRecord,
} from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { CuratorDatabase } from './database.js';
import { requireEntity } from './entity-registry.js';

type RecordColumns = Omit<ResearchRecord, 'record_id' | 'created_at'>;

/**
 * Records (cores, sections, samples) with their authorships, publication
 * references and measured parameters.
 */
export class RecordRepository {
    private readonly raw: Database.Database;

    constructor(db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    // ─── Records ──────────────────────────────────────────────

    create(input: RecordInput): ResearchRecord {
        const record = this.prepare(input);
        const result = this.raw
            .prepare(
                `INSERT INTO records (name, date_collected, description, medium, type, resolution, feature_id, min_year, max_year,
                    geo_wkt, geo_error, geo_elev, geo_elev_error, geo_type, geo_xmin, geo_xmax, geo_ymin, geo_ymax)
                 VALUES (@name, @date_collected, @description, @medium, @type, @resolution, @feature_id, @min_year, @max_year,
                    @geo_wkt, @geo_error, @geo_elev, @geo_elev_error, @geo_type, @geo_xmin, @geo_xmax, @geo_ymin, @geo_ymax)`
            )
            .run(record);
        return this.get(Number(result.lastInsertRowid));
    }

    update(recordId: number, changes: Partial<RecordInput>): ResearchRecord {
        const current = this.get(recordId);
        const record = this.prepare({ ...current, ...changes }, current);

        this.raw
            .prepare(
                `UPDATE records
                 SET name = @name, date_collected = @date_collected, description = @description, medium = @medium,
                     type = @type, resolution = @resolution, feature_id = @feature_id, min_year = @min_year, max_year = @max_year,
                     geo_wkt = @geo_wkt, geo_error = @geo_error, geo_elev = @geo_elev, geo_elev_error = @geo_elev_error,
                     geo_type = @geo_type, geo_xmin = @geo_xmin, geo_xmax = @geo_xmax, geo_ymin = @geo_ymin, geo_ymax = @geo_ymax
                 WHERE record_id = @record_id`
            )
            .run({ ...record, record_id: recordId });

        return this.get(recordId);
    }

    find(recordId: number): ResearchRecord | undefined {
        return this.raw.prepare<[number], ResearchRecord>('SELECT * FROM records WHERE record_id = ?').get(recordId);
    }

    get(recordId: number): ResearchRecord {
        const record = this.find(recordId);
        if (!record) throw new NotFoundError('record', recordId);
        return record;
    }

    list(): ResearchRecord[] {
        return this.raw.prepare<[], ResearchRecord>('SELECT * FROM records ORDER BY date_collected, name').all();
    }

    delete(recordId: number): void {
        this.get(recordId);
        this.raw.prepare('DELETE FROM records WHERE record_id = ?').run(recordId);
        purgeAnnotations(this.raw, { kind: 'record', id: recordId });
    }

    // ─── Authorships ──────────────────────────────────────────

    addAuthorship(recordId: number, personId: number, role: RecordAuthorRole, position = 0): RecordAuthorship {
        this.get(recordId);
        if (!oneOf(RECORD_AUTHOR_ROLES, role)) {
            throw new ValidationError(`"${String(role)}" is not a record authorship role`, { field: 'role' });
        }
        requireEntity(this.raw, { kind: 'person', id: personId });

        const result = this.raw
            .prepare('INSERT INTO record_authorships (record_id, person_id, role, position) VALUES (?, ?, ?, ?)')
            .run(recordId, personId, role, position);

        return { record_authorship_id: Number(result.lastInsertRowid), record_id: recordId, person_id: personId, role, position };
    }

    listAuthorships(recordId: number): RecordAuthorship[] {
        return this.raw
            .prepare<[number], RecordAuthorship>(
                'SELECT * FROM record_authorships WHERE record_id = ? ORDER BY position, record_authorship_id'
            )
            .all(recordId);
    }

    // ─── References ───────────────────────────────────────────

    addReference(recordId: number, publicationId: number, type: RecordReferenceType): RecordReference {
        this.get(recordId);
        if (!oneOf(RECORD_REFERENCE_TYPES, type)) {
            throw new ValidationError(`"${String(type)}" is not a record reference type`, { field: 'type' });
        }
        requireEntity(this.raw, { kind: 'publication', id: publicationId });

        const result = this.raw
            .prepare('INSERT INTO record_references (record_id, publication_id, type) VALUES (?, ?, ?)')
            .run(recordId, publicationId, type);

        return { record_reference_id: Number(result.lastInsertRowid), record_id: recordId, publication_id: publicationId, type };
    }

    /**
     * References of a record, oldest publication first.
     */
    listReferences(recordId: number): RecordReference[] {
        return this.raw
            .prepare<[number], RecordReference>(
                `SELECT r.* FROM record_references r
                 JOIN publications p ON p.publication_id = r.publication_id
                 WHERE r.record_id = ?
                 ORDER BY p.year, p.slug`
            )
            .all(recordId);
    }

    // ─── Parameters ───────────────────────────────────────────

    addParameter(recordId: number, input: RecordParameterInput): RecordParameter {
        this.get(recordId);
        requireEntity(this.raw, { kind: 'parameter', id: input.parameter_id });
        const row: Omit<RecordParameter, 'record_parameter_id'> = {
            record_id: recordId,
            parameter_id: input.parameter_id,
            units: input.units?.trim() ?? '',
            value_count: input.value_count ?? null,
            value_min: input.value_min ?? null,
            value_max: input.value_max ?? null,
            value_mean: input.value_mean ?? null,
        };

        if (row.value_count !== null && (!Number.isInteger(row.value_count) || row.value_count < 0)) {
            throw new ValidationError('value_count must be a non-negative integer', { field: 'value_count' });
        }
        if (row.value_min !== null && row.value_max !== null && row.value_min > row.value_max) {
            throw new ValidationError('value_min must not exceed value_max', { field: 'value_min' });
        }

        const result = this.raw
            .prepare(
                `INSERT INTO record_parameters (record_id, parameter_id, units, value_count, value_min, value_max, value_mean)
                 VALUES (@record_id, @parameter_id, @units, @value_count, @value_min, @value_max, @value_mean)`
            )
            .run(row);

        return { ...row, record_parameter_id: Number(result.lastInsertRowid) };
    }

    listParameters(recordId: number): RecordParameter[] {
        return this.raw
            .prepare<[number], RecordParameter>(
                'SELECT * FROM record_parameters WHERE record_id = ? ORDER BY record_parameter_id'
            )
            .all(recordId);
    }

    // ─── Internal helpers ─────────────────────────────────────

    private prepare(input: RecordInput, previous?: ResearchRecord): RecordColumns {
        const name = input.name.trim();
        if (name === '') {
            throw new ValidationError('A record needs a name', { field: 'name' });
        }
        if (!oneOf(RECORD_TYPES, input.type)) {
            throw new ValidationError(`"${String(input.type)}" is not a record type`, { field: 'type' });
        }

        const medium = input.medium ?? null;
        if (medium !== null && !oneOf(RECORD_MEDIA, medium)) {
            throw new ValidationError(`"${String(medium)}" is not a record medium`, { field: 'medium' });
        }
        const resolution = input.resolution ?? null;
        if (resolution !== null && !oneOf(RECORD_RESOLUTIONS, resolution)) {
            throw new ValidationError(`"${String(resolution)}" is not a record resolution`, { field: 'resolution' });
        }

        const dateCollected = input.date_collected?.trim() || null;
        if (dateCollected !== null && !/^\d{4}-\d{2}-\d{2}$/.test(dateCollected)) {
            throw new ValidationError(`"${dateCollected}" is not an ISO date (YYYY-MM-DD)`, { field: 'date_collected' });
        }

        const minYear = input.min_year ?? null;
        const maxYear = input.max_year ?? null;
        if (minYear !== null && maxYear !== null && minYear > maxYear) {
            throw new ValidationError(`min_year ${minYear} is after max_year ${maxYear}`, { field: 'min_year' });
        }

        const featureId = input.feature_id ?? null;
        if (featureId !== null) {
            requireEntity(this.raw, { kind: 'feature', id: featureId });
        }

        return {
            name,
            date_collected: dateCollected,
            description: input.description ?? '',
            medium,
            type: input.type,
            resolution,
            feature_id: featureId,
            min_year: minYear,
            max_year: maxYear,
            ...computeGeoFields(input, previous),
        };
    }
}

function oneOf<T extends string>(values: readonly T[], value: string): value is T {
    return values.some((candidate) => candidate === value);
}

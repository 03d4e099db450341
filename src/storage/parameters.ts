import type Database from 'better-sqlite3';
import { purgeAnnotations } from '../annotations/store.js';
import type { Parameter, ParameterInput } from '../types/index.js';
import { NotFoundError, ValidationError, guardUnique } from '../utils/errors.js';
import type { CuratorDatabase } from './database.js';

const SLUG_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Measured quantities, addressed by slug.
 */
export class ParameterRepository {
    private readonly raw: Database.Database;

    constructor(db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    create(input: ParameterInput): Parameter {
        const parameter = normalizeParameter(input);
        const result = guardUnique('parameters.slug', `Parameter slug "${parameter.slug}" is already taken`, () =>
            this.raw
                .prepare(
                    `INSERT INTO parameters (name, slug, description, preparation, instrumentation)
                     VALUES (@name, @slug, @description, @preparation, @instrumentation)`
                )
                .run(parameter)
        );
        return this.get(Number(result.lastInsertRowid));
    }

    update(parameterId: number, changes: Partial<ParameterInput>): Parameter {
        const current = this.get(parameterId);
        const parameter = normalizeParameter({ ...current, ...changes });

        guardUnique('parameters.slug', `Parameter slug "${parameter.slug}" is already taken`, () =>
            this.raw
                .prepare(
                    `UPDATE parameters
                     SET name = @name, slug = @slug, description = @description,
                         preparation = @preparation, instrumentation = @instrumentation
                     WHERE parameter_id = @parameter_id`
                )
                .run({ ...parameter, parameter_id: parameterId })
        );
        return this.get(parameterId);
    }

    find(parameterId: number): Parameter | undefined {
        return this.raw.prepare<[number], Parameter>('SELECT * FROM parameters WHERE parameter_id = ?').get(parameterId);
    }

    get(parameterId: number): Parameter {
        const parameter = this.find(parameterId);
        if (!parameter) throw new NotFoundError('parameter', parameterId);
        return parameter;
    }

    getBySlug(slug: string): Parameter {
        const parameter = this.raw.prepare<[string], Parameter>('SELECT * FROM parameters WHERE slug = ?').get(slug);
        if (!parameter) throw new NotFoundError('parameter', slug);
        return parameter;
    }

    list(): Parameter[] {
        return this.raw.prepare<[], Parameter>('SELECT * FROM parameters ORDER BY slug').all();
    }

    /**
     * Delete a parameter. Fails while any record still reports it.
     */
    delete(parameterId: number): void {
        this.get(parameterId);
        const used = this.raw
            .prepare<[number], { count: number }>('SELECT COUNT(*) as count FROM record_parameters WHERE parameter_id = ?')
            .get(parameterId);
        if ((used?.count ?? 0) > 0) {
            throw new ValidationError(`Parameter ${parameterId} is still measured on ${used?.count ?? 0} record(s)`);
        }
        this.raw.prepare('DELETE FROM parameters WHERE parameter_id = ?').run(parameterId);
        purgeAnnotations(this.raw, { kind: 'parameter', id: parameterId });
    }
}

function normalizeParameter(input: ParameterInput): Omit<Parameter, 'parameter_id' | 'created_at'> {
    const name = input.name.trim();
    if (name === '') {
        throw new ValidationError('A parameter needs a name', { field: 'name' });
    }
    const slug = input.slug.trim();
    if (!SLUG_PATTERN.test(slug)) {
        throw new ValidationError(`Parameter slug "${slug}" may only contain letters, digits, "_", "." and "-"`, {
            field: 'slug',
        });
    }

    return {
        name,
        slug,
        description: input.description ?? '',
        preparation: input.preparation ?? '',
        instrumentation: input.instrumentation ?? '',
    };
}

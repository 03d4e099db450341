import type Database from 'better-sqlite3';
import { purgeAnnotations } from '../annotations/store.js';
import { computeGeoFields } from '../geometry/geo-fields.js';
import { FEATURE_TYPES, type Feature, type FeatureInput, type FeatureType } from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { CuratorDatabase } from './database.js';

type FeatureColumns = Omit<Feature, 'feature_id' | 'created_at'>;

/**
 * Geographic features arranged in a tree. `recursive_depth` and the geo
 * cache columns are derived on every save, never taken from the caller.
 */
export class FeatureRepository {
    private readonly raw: Database.Database;

    constructor(private readonly db: CuratorDatabase) {
        this.raw = db.getRawDb();
    }

    create(input: FeatureInput): Feature {
        return this.db.transaction(() => {
            const feature = this.prepare(input);
            const result = this.raw
                .prepare(
                    `INSERT INTO features (name, type, parent_id, recursive_depth,
                        geo_wkt, geo_error, geo_elev, geo_elev_error, geo_type, geo_xmin, geo_xmax, geo_ymin, geo_ymax)
                     VALUES (@name, @type, @parent_id, @recursive_depth,
                        @geo_wkt, @geo_error, @geo_elev, @geo_elev_error, @geo_type, @geo_xmin, @geo_xmax, @geo_ymin, @geo_ymax)`
                )
                .run(feature);
            return this.get(Number(result.lastInsertRowid));
        });
    }

    /**
     * Save changes, then recompute the depth of every descendant so the
     * subtree stays consistent after a reparenting.
     */
    update(featureId: number, changes: Partial<FeatureInput>): Feature {
        return this.db.transaction(() => {
            const current = this.get(featureId);
            const feature = this.prepare({ ...current, ...changes }, current);

            this.raw
                .prepare(
                    `UPDATE features
                     SET name = @name, type = @type, parent_id = @parent_id, recursive_depth = @recursive_depth,
                         geo_wkt = @geo_wkt, geo_error = @geo_error, geo_elev = @geo_elev, geo_elev_error = @geo_elev_error,
                         geo_type = @geo_type, geo_xmin = @geo_xmin, geo_xmax = @geo_xmax, geo_ymin = @geo_ymin, geo_ymax = @geo_ymax
                     WHERE feature_id = @feature_id`
                )
                .run({ ...feature, feature_id: featureId });

            const cascaded = this.cascadeDepth(featureId, feature.recursive_depth);
            if (cascaded > 0) {
                getLogger().debug({ featureId, cascaded }, 'Descendant depths recomputed');
            }
            return this.get(featureId);
        });
    }

    find(featureId: number): Feature | undefined {
        return this.raw.prepare<[number], Feature>('SELECT * FROM features WHERE feature_id = ?').get(featureId);
    }

    get(featureId: number): Feature {
        const feature = this.find(featureId);
        if (!feature) throw new NotFoundError('feature', featureId);
        return feature;
    }

    children(featureId: number): Feature[] {
        return this.raw
            .prepare<[number], Feature>('SELECT * FROM features WHERE parent_id = ? ORDER BY name, feature_id')
            .all(featureId);
    }

    list(): Feature[] {
        return this.raw.prepare<[], Feature>('SELECT * FROM features ORDER BY recursive_depth, name').all();
    }

    /**
     * Delete a leaf feature. Features with children must be emptied first.
     */
    delete(featureId: number): void {
        this.get(featureId);
        const children = this.children(featureId).length;
        if (children > 0) {
            throw new ValidationError(`Feature ${featureId} still has ${children} child feature(s)`, {
                field: 'parent_id',
            });
        }
        this.raw.prepare('DELETE FROM features WHERE feature_id = ?').run(featureId);
        purgeAnnotations(this.raw, { kind: 'feature', id: featureId });
    }

    /**
     * Depth of a feature whose parent is `parentId`, found by walking the
     * stored parent chain up to a root. Fails if `selfId` is met on the way.
     */
    depthUnder(parentId: number | null, selfId?: number): number {
        const visited = new Set<number>();
        let depth = 0;
        let cursor = parentId;

        while (cursor !== null) {
            if (cursor === selfId) {
                throw new ValidationError(`Feature ${selfId} cannot be its own ancestor`, { field: 'parent_id' });
            }
            if (visited.has(cursor)) {
                throw new ValidationError(`Feature ${cursor} sits on a parent cycle`, { field: 'parent_id' });
            }
            visited.add(cursor);

            const row = this.raw
                .prepare<[number], { parent_id: number | null }>('SELECT parent_id FROM features WHERE feature_id = ?')
                .get(cursor);
            if (!row) throw new NotFoundError('feature', cursor);

            depth++;
            cursor = row.parent_id;
        }

        return depth;
    }

    // ─── Internal helpers ─────────────────────────────────────

    private prepare(input: FeatureInput, previous?: Feature): FeatureColumns {
        const name = input.name.trim();
        if (name === '') {
            throw new ValidationError('A feature needs a name', { field: 'name' });
        }
        if (!isFeatureType(input.type)) {
            throw new ValidationError(`"${String(input.type)}" is not a feature type`, { field: 'type' });
        }

        const parentId = input.parent_id ?? null;
        return {
            name,
            type: input.type,
            parent_id: parentId,
            recursive_depth: this.depthUnder(parentId, previous?.feature_id),
            ...computeGeoFields(input, previous),
        };
    }

    private cascadeDepth(featureId: number, depth: number): number {
        const update = this.raw.prepare('UPDATE features SET recursive_depth = ? WHERE feature_id = ?');
        let updated = 0;
        let level: number[] = [featureId];
        let levelDepth = depth;

        while (level.length > 0) {
            const next: number[] = [];
            for (const parentId of level) {
                for (const child of this.children(parentId)) {
                    update.run(levelDepth + 1, child.feature_id);
                    next.push(child.feature_id);
                    updated++;
                }
            }
            level = next;
            levelDepth++;
        }

        return updated;
    }
}

function isFeatureType(value: string): value is FeatureType {
    return FEATURE_TYPES.some((type) => type === value);
}

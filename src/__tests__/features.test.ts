import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CuratorDatabase } from '../storage/database.js';
import { createStore, type CuratorStore } from '../storage/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

describe('FeatureRepository', () => {
    let store: CuratorStore;

    beforeEach(() => {
        store = createStore(new CuratorDatabase(':memory:'));
    });

    afterEach(() => {
        store.db.close();
    });

    function depths(): Record<string, number> {
        return Object.fromEntries(store.features.list().map((f) => [f.name, f.recursive_depth]));
    }

    describe('depth', () => {
        it('should give roots depth 0 and children parent depth + 1', () => {
            const canada = store.features.create({ name: 'Canada', type: 'geopolitical_unit' });
            const novaScotia = store.features.create({ name: 'Nova Scotia', type: 'region', parent_id: canada.feature_id });
            const lake = store.features.create({ name: 'Lake Major', type: 'water_body', parent_id: novaScotia.feature_id });

            expect(canada.recursive_depth).toBe(0);
            expect(novaScotia.recursive_depth).toBe(1);
            expect(lake.recursive_depth).toBe(2);
        });

        it('should recompute the whole subtree after reparenting', () => {
            const world = store.features.create({ name: 'World', type: 'region' });
            const canada = store.features.create({ name: 'Canada', type: 'geopolitical_unit', parent_id: world.feature_id });
            const atlantic = store.features.create({ name: 'Atlantic', type: 'region' });
            const novaScotia = store.features.create({ name: 'Nova Scotia', type: 'region', parent_id: atlantic.feature_id });
            store.features.create({ name: 'Lake Major', type: 'water_body', parent_id: novaScotia.feature_id });

            expect(depths()).toEqual({ World: 0, Atlantic: 0, Canada: 1, 'Nova Scotia': 1, 'Lake Major': 2 });

            // Atlantic moves under Canada: everything below it drops two levels
            store.features.update(atlantic.feature_id, { parent_id: canada.feature_id });
            expect(depths()).toEqual({ World: 0, Canada: 1, Atlantic: 2, 'Nova Scotia': 3, 'Lake Major': 4 });

            // Canada becomes a root: its subtree rises one level
            store.features.update(canada.feature_id, { parent_id: null });
            expect(depths()).toEqual({ World: 0, Canada: 0, Atlantic: 1, 'Nova Scotia': 2, 'Lake Major': 3 });
        });

        it('should reject self-parenting', () => {
            const lake = store.features.create({ name: 'Lake', type: 'water_body' });
            expect(() => store.features.update(lake.feature_id, { parent_id: lake.feature_id })).toThrow(ValidationError);
        });

        it('should reject a reparenting that creates a cycle', () => {
            const a = store.features.create({ name: 'A', type: 'region' });
            const b = store.features.create({ name: 'B', type: 'region', parent_id: a.feature_id });
            const c = store.features.create({ name: 'C', type: 'region', parent_id: b.feature_id });

            expect(() => store.features.update(a.feature_id, { parent_id: c.feature_id })).toThrow(
                'cannot be its own ancestor'
            );
            expect(store.features.get(a.feature_id).parent_id).toBeNull();
        });

        it('should reject an unknown parent', () => {
            expect(() => store.features.create({ name: 'Lake', type: 'water_body', parent_id: 99 })).toThrow(NotFoundError);
        });
    });

    describe('geometry', () => {
        it('should cache type and bounds from the WKT', () => {
            const lake = store.features.create({
                name: 'Lake Major',
                type: 'water_body',
                geo_wkt: 'POLYGON ((-63.5 44.7, -63.4 44.7, -63.4 44.8, -63.5 44.7))',
            });

            expect(lake).toMatchObject({
                geo_type: 'POLYGON',
                geo_xmin: -63.5,
                geo_xmax: -63.4,
                geo_ymin: 44.7,
                geo_ymax: 44.8,
            });
        });

        it('should recompute the cache when the WKT changes', () => {
            const lake = store.features.create({ name: 'Lake', type: 'water_body', geo_wkt: 'POINT (1 2)' });
            const moved = store.features.update(lake.feature_id, { geo_wkt: 'LINESTRING (0 0, 5 -3)' });

            expect(moved).toMatchObject({ geo_type: 'LINESTRING', geo_xmin: 0, geo_xmax: 5, geo_ymin: -3, geo_ymax: 0 });
        });

        it('should store an empty geometry with null bounds', () => {
            const lake = store.features.create({ name: 'Lake', type: 'water_body' });
            expect(lake).toMatchObject({ geo_wkt: '', geo_type: 'EMPTY', geo_xmin: null, geo_ymax: null });
        });

        it('should reject malformed WKT without writing', () => {
            expect(() => store.features.create({ name: 'Lake', type: 'water_body', geo_wkt: 'POINT (1)' })).toThrow(
                ValidationError
            );
            expect(store.features.list()).toEqual([]);
        });
    });

    describe('validation and deletion', () => {
        it('should require a name', () => {
            expect(() => store.features.create({ name: ' ', type: 'bog' })).toThrow(ValidationError);
        });

        it('should refuse to delete a feature with children', () => {
            const parent = store.features.create({ name: 'Region', type: 'region' });
            const child = store.features.create({ name: 'Bog', type: 'bog', parent_id: parent.feature_id });

            expect(() => store.features.delete(parent.feature_id)).toThrow(ValidationError);

            store.features.delete(child.feature_id);
            store.features.delete(parent.feature_id);
            expect(store.features.list()).toEqual([]);
        });

        it('should list children by name', () => {
            const parent = store.features.create({ name: 'Region', type: 'region' });
            store.features.create({ name: 'Zeta Bog', type: 'bog', parent_id: parent.feature_id });
            store.features.create({ name: 'Alpha Lake', type: 'water_body', parent_id: parent.feature_id });

            expect(store.features.children(parent.feature_id).map((f) => f.name)).toEqual(['Alpha Lake', 'Zeta Bog']);
        });
    });
});

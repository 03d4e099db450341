import type { GeoFields, GeoInput } from './geometry.js';

export const FEATURE_TYPES = ['water_body', 'glacier', 'bog', 'geopolitical_unit', 'region'] as const;

export type FeatureType = (typeof FEATURE_TYPES)[number];

/**
 * A named geographic feature arranged in a tree (lake within region within country).
 */
export interface Feature extends GeoFields {
    feature_id: number;
    name: string;
    type: FeatureType;
    parent_id: number | null;

    /** 0 for roots, parent depth + 1 otherwise. Derived. */
    recursive_depth: number;

    created_at?: string;
}

export type FeatureInput = Pick<Feature, 'name' | 'type'> & Partial<Pick<Feature, 'parent_id'>> & GeoInput;

import type { GeoFields, GeoInput } from './geometry.js';

export const RECORD_MEDIA = ['lacustrine', 'marine', 'peat', 'glacial_ice', 'speleothem', 'tree_ring', 'terrestrial'] as const;
export const RECORD_TYPES = ['sediment_core', 'ice_core', 'peat_core', 'section', 'sample'] as const;
export const RECORD_RESOLUTIONS = ['annual', 'decadal', 'centennial', 'millennial', 'irregular'] as const;
export const RECORD_AUTHOR_ROLES = ['assisted', 'collected', 'funded', 'analyzed', 'published', 'maintains'] as const;
export const RECORD_REFERENCE_TYPES = ['refers_to', 'contains_data_from'] as const;

export type RecordMedium = (typeof RECORD_MEDIA)[number];
export type RecordType = (typeof RECORD_TYPES)[number];
export type RecordResolution = (typeof RECORD_RESOLUTIONS)[number];
export type RecordAuthorRole = (typeof RECORD_AUTHOR_ROLES)[number];
export type RecordReferenceType = (typeof RECORD_REFERENCE_TYPES)[number];

/**
 * A physical sample or archive (core, section) and the data derived from it.
 */
export interface ResearchRecord extends GeoFields {
    record_id: number;
    name: string;
    /** ISO date (YYYY-MM-DD) */
    date_collected: string | null;
    description: string;
    medium: RecordMedium | null;
    type: RecordType;
    resolution: RecordResolution | null;
    feature_id: number | null;
    min_year: number | null;
    max_year: number | null;
    created_at?: string;
}

export type RecordInput = Pick<ResearchRecord, 'name' | 'type'> &
    Partial<
        Pick<
            ResearchRecord,
            'date_collected' | 'description' | 'medium' | 'resolution' | 'feature_id' | 'min_year' | 'max_year'
        >
    > &
    GeoInput;

export interface RecordAuthorship {
    record_authorship_id: number;
    record_id: number;
    person_id: number;
    role: RecordAuthorRole;
    position: number;
}

export interface RecordReference {
    record_reference_id: number;
    record_id: number;
    publication_id: number;
    type: RecordReferenceType;
}

/**
 * Summary statistics of a parameter measured on a record.
 */
export interface RecordParameter {
    record_parameter_id: number;
    record_id: number;
    parameter_id: number;
    units: string;
    value_count: number | null;
    value_min: number | null;
    value_max: number | null;
    value_mean: number | null;
}

export type RecordParameterInput = Pick<RecordParameter, 'parameter_id'> &
    Partial<Pick<RecordParameter, 'units' | 'value_count' | 'value_min' | 'value_max' | 'value_mean'>>;

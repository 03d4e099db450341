/**
 * Geometry types recognised in well-known text.
 * `EMPTY` is reported for blank input.
 */
export type GeometryType =
    | 'EMPTY'
    | 'POINT'
    | 'LINESTRING'
    | 'POLYGON'
    | 'MULTIPOINT'
    | 'MULTILINESTRING'
    | 'MULTIPOLYGON';

/**
 * Axis-aligned bounding box. All fields are null when no coordinate was found.
 */
export interface Bounds {
    xmin: number | null;
    xmax: number | null;
    ymin: number | null;
    ymax: number | null;
}

/**
 * Columns shared by every geolocated entity.
 * `geo_type` and the `geo_*min/max` fields are derived from `geo_wkt`.
 */
export interface GeoFields {
    geo_wkt: string;
    geo_error: number;
    geo_elev: number;
    geo_elev_error: number;
    geo_type: GeometryType;
    geo_xmin: number | null;
    geo_xmax: number | null;
    geo_ymin: number | null;
    geo_ymax: number | null;
}

/** Geo columns a caller may set; the rest are computed. */
export type GeoInput = Partial<Pick<GeoFields, 'geo_wkt' | 'geo_error' | 'geo_elev' | 'geo_elev_error'>>;

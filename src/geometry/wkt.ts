import type { Bounds, GeometryType } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Well-known-text grammar, built bottom-up from the coordinate pair.
 *
 *   NUMBER       signed decimal with optional exponent
 *   COORDINATE   NUMBER whitespace NUMBER
 *   COORDINATES  ( COORDINATE , ... )
 *   RINGS        ( COORDINATES , ... )
 */
const NUMBER = String.raw`[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?`;
const COORDINATE = String.raw`\s*(${NUMBER})\s+(${NUMBER})\s*`;
const COORDINATES = String.raw`\((?:${COORDINATE})(?:,${COORDINATE})*\)`;
const POINT_COORDINATES = String.raw`\((?:\s*\(${COORDINATE}\))(?:,\s*\(${COORDINATE}\))*\)`;
const RINGS = String.raw`\(\s*${COORDINATES}\s*(?:,\s*${COORDINATES}\s*)*\)`;

function fullMatch(pattern: string): RegExp {
    return new RegExp(`^(?:${pattern})$`);
}

/**
 * Geometry patterns in the order they are tried. Each keyword needs at
 * least one space before its coordinates.
 * MULTIPOINT accepts both `MULTIPOINT ((1 2), (3 4))` and `MULTIPOINT (1 2, 3 4)`.
 */
const GEOMETRY_PATTERNS: ReadonlyArray<[Exclude<GeometryType, 'EMPTY'>, RegExp]> = [
    ['POINT', fullMatch(String.raw`POINT\s+\(${COORDINATE}\)`)],
    ['LINESTRING', fullMatch(String.raw`LINESTRING\s+${COORDINATES}`)],
    ['POLYGON', fullMatch(String.raw`POLYGON\s+${RINGS}`)],
    ['MULTIPOINT', fullMatch(String.raw`MULTIPOINT\s+(?:${POINT_COORDINATES}|${COORDINATES})`)],
    ['MULTILINESTRING', fullMatch(String.raw`MULTILINESTRING\s+${RINGS}`)],
    ['MULTIPOLYGON', fullMatch(String.raw`MULTIPOLYGON\s+\(\s*${RINGS}\s*(?:,\s*${RINGS}\s*)*\)`)],
];

const COORDINATE_SCAN = new RegExp(COORDINATE, 'g');

/**
 * Find the geometry type of a WKT string.
 * Blank or missing input is EMPTY; anything else must match a pattern
 * in full, surrounding whitespace included, or the result is null.
 */
export function identifyGeometry(value: string | null | undefined): GeometryType | null {
    if (!value || value.trim() === '') {
        return 'EMPTY';
    }

    for (const [type, pattern] of GEOMETRY_PATTERNS) {
        if (pattern.test(value)) return type;
    }
    return null;
}

/**
 * Throw ValidationError unless `value` is blank or well-formed WKT.
 */
export function validateWkt(value: string | null | undefined): void {
    if (identifyGeometry(value) === null) {
        throw new ValidationError('The value is not valid well-known text', { field: 'geo_wkt' });
    }
}

/**
 * Bounding box of every coordinate pair found anywhere in `value`.
 *
 * Not geometry-aware: partially well-formed text still yields bounds
 * from whatever pairs it contains.
 */
export function wktBounds(value: string | null | undefined): Bounds {
    const bounds: Bounds = { xmin: null, xmax: null, ymin: null, ymax: null };
    if (!value) return bounds;

    for (const match of value.matchAll(COORDINATE_SCAN)) {
        const x = Number(match[1]);
        const y = Number(match[2]);
        bounds.xmin = bounds.xmin === null ? x : Math.min(bounds.xmin, x);
        bounds.xmax = bounds.xmax === null ? x : Math.max(bounds.xmax, x);
        bounds.ymin = bounds.ymin === null ? y : Math.min(bounds.ymin, y);
        bounds.ymax = bounds.ymax === null ? y : Math.max(bounds.ymax, y);
    }

    return bounds;
}

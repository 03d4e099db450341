import type { GeoFields, GeoInput } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { identifyGeometry, wktBounds } from './wkt.js';

/**
 * Compute the full set of geo columns from caller-supplied input.
 * The geometry type and bounding box are always derived from `geo_wkt`.
 */
export function computeGeoFields(input: GeoInput, previous?: GeoFields): GeoFields {
    const wkt = (input.geo_wkt ?? previous?.geo_wkt ?? '').trim();
    const type = identifyGeometry(wkt);
    if (type === null) {
        throw new ValidationError(`The value is not valid well-known text: ${truncate(wkt, 60)}`, { field: 'geo_wkt' });
    }

    const bounds = wktBounds(wkt);

    return {
        geo_wkt: wkt,
        geo_error: input.geo_error ?? previous?.geo_error ?? 0,
        geo_elev: input.geo_elev ?? previous?.geo_elev ?? 0,
        geo_elev_error: input.geo_elev_error ?? previous?.geo_elev_error ?? 0,
        geo_type: type,
        geo_xmin: bounds.xmin,
        geo_xmax: bounds.xmax,
        geo_ymin: bounds.ymin,
        geo_ymax: bounds.ymax,
    };
}

function truncate(text: string, length: number): string {
    return text.length > length ? `${text.slice(0, length)}...` : text;
}

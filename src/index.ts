/**
 * paleo-curator: curatorial database core for paleoclimate research records.
 */

export * from './types/index.js';
export * from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig, mergeConfig, loadEnvVars } from './utils/config.js';
export type { ConfigOverrides } from './utils/config.js';

export { identifyGeometry, validateWkt, wktBounds } from './geometry/wkt.js';
export { computeGeoFields } from './geometry/geo-fields.js';

export { AnnotationStore, validateAnnotationKey } from './annotations/store.js';
export type { TransferResult } from './annotations/store.js';
export { RevisionLog, RevisionScope } from './audit/revisions.js';

export {
    CuratorDatabase,
    FeatureRepository,
    ParameterRepository,
    PeopleRepository,
    PublicationRepository,
    RecordRepository,
    createStore,
    openStore,
    formatPersonName,
} from './storage/index.js';
export type { CuratorStore, ReassignResult, StatTable } from './storage/index.js';

export { importBibtex, importCslJson, encodeMetaValue, decodeMetaValue, metaKey } from './bibliography/importer.js';
export type { ImportOptions } from './bibliography/importer.js';
export { parseBibtex, formatBibtexEntry, BibtexParseError } from './bibliography/bibtex.js';
export type { BibtexEntry } from './bibliography/bibtex.js';
export { parseCslSource, extractYear, CSL_NAME_ROLES } from './bibliography/csl.js';
export type { CslItem, CslName } from './bibliography/csl.js';
export { renderAlias, parseBibtexName, parseBibtexNames, cslNameToPersonName } from './bibliography/names.js';
export type { PersonName } from './bibliography/names.js';
export {
    authorDateKey,
    describePublication,
    slugBase,
    chooseSlug,
    stripDisambiguation,
    normalizeDoi,
} from './bibliography/citation.js';

export { combinePeople } from './merge/combine.js';
export type { CombineOptions, CombineResult, CombinedLoser } from './merge/combine.js';
export { exportPublications, renderPublications, toCslItem } from './exporters/export.js';
export type { ExportFormat } from './exporters/export.js';

/**
 * Barrel export for all shared types.
 */
export type { Person, PersonInput, Alias, ContactInfo, ContactInfoInput } from './person.js';
export type { Publication, PublicationInput, Authorship, AuthorshipInput, AuthorshipWithName } from './publication.js';
export { FEATURE_TYPES } from './feature.js';
export type { Feature, FeatureInput, FeatureType } from './feature.js';
export {
    RECORD_MEDIA,
    RECORD_TYPES,
    RECORD_RESOLUTIONS,
    RECORD_AUTHOR_ROLES,
    RECORD_REFERENCE_TYPES,
} from './record.js';
export type {
    ResearchRecord,
    RecordInput,
    RecordMedium,
    RecordType,
    RecordResolution,
    RecordAuthorRole,
    RecordReferenceType,
    RecordAuthorship,
    RecordReference,
    RecordParameter,
    RecordParameterInput,
} from './record.js';
export type { Parameter, ParameterInput } from './parameter.js';
export type { GeometryType, Bounds, GeoFields, GeoInput } from './geometry.js';
export { ENTITY_KINDS, DEFAULT_ANNOTATION_TYPE, META_ANNOTATION_TYPE } from './annotation.js';
export type { EntityKind, EntityRef, Tag, TagInput, Attachment, AttachmentInput } from './annotation.js';
export type { Snapshot, RevisionMeta, Revision } from './audit.js';
export { DEFAULT_CONFIG } from './config.js';
export type { CuratorConfig, ImportConfig, LogLevel } from './config.js';

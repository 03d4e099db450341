/**
 * Entity kinds that can own tags and attachments.
 */
export const ENTITY_KINDS = ['person', 'publication', 'feature', 'record', 'parameter'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/**
 * Polymorphic reference to any stored entity.
 */
export interface EntityRef {
    kind: EntityKind;
    id: number;
}

/** Annotation type used when the caller does not name one. */
export const DEFAULT_ANNOTATION_TYPE = 'tag';

/** Annotation type holding residual CSL-JSON fields. */
export const META_ANNOTATION_TYPE = 'meta';

/**
 * Key/value annotation attached to an entity.
 * Unique per (owner_kind, owner_id, type, key).
 */
export interface Tag {
    tag_id?: number;
    owner_kind: EntityKind;
    owner_id: number;
    type: string;
    key: string;
    value: string;
    comment: string;
}

/**
 * Key/file annotation attached to an entity. `file` is a reference into
 * whatever file storage the host application uses.
 */
export interface Attachment {
    attachment_id?: number;
    owner_kind: EntityKind;
    owner_id: number;
    type: string;
    key: string;
    file: string;
    comment: string;
}

export interface TagInput {
    type?: string;
    key: string;
    value: string;
    comment?: string;
}

export interface AttachmentInput {
    type?: string;
    key: string;
    file: string;
    comment?: string;
}

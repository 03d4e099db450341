/**
 * A citable work identified by a stable slug (citation key).
 */
export interface Publication {
    /** Internal auto-increment ID (SQLite rowid) */
    publication_id: number;

    /** Unique citation key */
    slug: string;

    title: string;
    year: number;

    /** Normalized DOI (lowercase, without https://doi.org/ prefix) */
    doi: string | null;

    url: string | null;

    /** CSL item type (e.g., "article-journal") */
    type: string;

    abstract: string | null;

    /** Source entry as imported (BibTeX text or CSL-JSON) */
    source_text: string;

    created_at?: string;
}

export type PublicationInput = Pick<Publication, 'slug' | 'title' | 'year'> &
    Partial<Pick<Publication, 'doi' | 'url' | 'type' | 'abstract' | 'source_text'>>;

/**
 * Junction table: links a publication to a person with a role and position.
 * `position` orders people within the same (publication, role).
 */
export interface Authorship {
    authorship_id: number;
    publication_id: number;
    person_id: number;
    /** Free-form role, e.g. "author", "editor" */
    role: string;
    position: number;
}

export interface AuthorshipInput {
    person_id: number;
    role: string;
    position: number;
}

/**
 * Author row joined with the person's last name, used for citation text.
 */
export interface AuthorshipWithName extends Authorship {
    last_name: string;
    given_names: string;
    suffix: string;
}

/**
 * An author, collector or curator referenced by publications and records.
 */
export interface Person {
    /** Internal auto-increment ID (SQLite rowid) */
    person_id: number;

    given_names: string;
    last_name: string;
    suffix: string;

    /** ORCID iD (e.g., "0000-0002-1825-0097"), unique when present */
    orcid: string | null;

    created_at?: string;
}

export type PersonInput = Pick<Person, 'last_name'> & Partial<Pick<Person, 'given_names' | 'suffix' | 'orcid'>>;

/**
 * Rendered name string that resolves to exactly one person.
 * The alias column is globally unique.
 */
export interface Alias {
    alias_id: number;
    person_id: number;
    alias: string;
}

export interface ContactInfo {
    contact_id: number;
    person_id: number;
    /** ISO date (YYYY-MM-DD) the information was last confirmed */
    updated: string;
    email: string;
    telephone: string;
    address: string;
}

export type ContactInfoInput = Pick<ContactInfo, 'updated'> & Partial<Pick<ContactInfo, 'email' | 'telephone' | 'address'>>;

import Database from 'better-sqlite3';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * People, publications, features, records, parameters, their join tables,
 * polymorphic annotations and the revision log.
 */
const MIGRATION_V1 = `
-- People and the names that resolve to them
CREATE TABLE IF NOT EXISTS people (
  person_id INTEGER PRIMARY KEY,
  given_names TEXT NOT NULL DEFAULT '',
  last_name TEXT NOT NULL,
  suffix TEXT NOT NULL DEFAULT '',
  orcid TEXT UNIQUE,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS aliases (
  alias_id INTEGER PRIMARY KEY,
  person_id INTEGER NOT NULL REFERENCES people(person_id) ON DELETE CASCADE,
  alias TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS contact_info (
  contact_id INTEGER PRIMARY KEY,
  person_id INTEGER NOT NULL REFERENCES people(person_id) ON DELETE CASCADE,
  updated TEXT NOT NULL,
  email TEXT NOT NULL DEFAULT '',
  telephone TEXT NOT NULL DEFAULT '',
  address TEXT NOT NULL DEFAULT ''
);

-- Publications and their ordered authorships
CREATE TABLE IF NOT EXISTS publications (
  publication_id INTEGER PRIMARY KEY,
  slug TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  year INTEGER NOT NULL,
  doi TEXT,
  url TEXT,
  type TEXT NOT NULL DEFAULT 'article-journal',
  abstract TEXT,
  source_text TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS authorships (
  authorship_id INTEGER PRIMARY KEY,
  publication_id INTEGER NOT NULL REFERENCES publications(publication_id) ON DELETE CASCADE,
  person_id INTEGER NOT NULL REFERENCES people(person_id) ON DELETE RESTRICT,
  role TEXT NOT NULL,
  position INTEGER NOT NULL DEFAULT 0
);

-- Geographic features (tree)
CREATE TABLE IF NOT EXISTS features (
  feature_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  type TEXT NOT NULL,
  parent_id INTEGER REFERENCES features(feature_id) ON DELETE RESTRICT,
  recursive_depth INTEGER NOT NULL DEFAULT 0,
  geo_wkt TEXT NOT NULL DEFAULT '',
  geo_error REAL NOT NULL DEFAULT 0,
  geo_elev REAL NOT NULL DEFAULT 0,
  geo_elev_error REAL NOT NULL DEFAULT 0,
  geo_type TEXT NOT NULL DEFAULT 'EMPTY',
  geo_xmin REAL,
  geo_xmax REAL,
  geo_ymin REAL,
  geo_ymax REAL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Measured quantities
CREATE TABLE IF NOT EXISTS parameters (
  parameter_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  slug TEXT NOT NULL UNIQUE,
  description TEXT NOT NULL DEFAULT '',
  preparation TEXT NOT NULL DEFAULT '',
  instrumentation TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Records (cores, sections, samples)
CREATE TABLE IF NOT EXISTS records (
  record_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  date_collected TEXT,
  description TEXT NOT NULL DEFAULT '',
  medium TEXT,
  type TEXT NOT NULL,
  resolution TEXT,
  feature_id INTEGER REFERENCES features(feature_id) ON DELETE SET NULL,
  min_year INTEGER,
  max_year INTEGER,
  geo_wkt TEXT NOT NULL DEFAULT '',
  geo_error REAL NOT NULL DEFAULT 0,
  geo_elev REAL NOT NULL DEFAULT 0,
  geo_elev_error REAL NOT NULL DEFAULT 0,
  geo_type TEXT NOT NULL DEFAULT 'EMPTY',
  geo_xmin REAL,
  geo_xmax REAL,
  geo_ymin REAL,
  geo_ymax REAL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS record_authorships (
  record_authorship_id INTEGER PRIMARY KEY,
  record_id INTEGER NOT NULL REFERENCES records(record_id) ON DELETE CASCADE,
  person_id INTEGER NOT NULL REFERENCES people(person_id) ON DELETE RESTRICT,
  role TEXT NOT NULL,
  position INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS record_references (
  record_reference_id INTEGER PRIMARY KEY,
  record_id INTEGER NOT NULL REFERENCES records(record_id) ON DELETE CASCADE,
  publication_id INTEGER NOT NULL REFERENCES publications(publication_id) ON DELETE CASCADE,
  type TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS record_parameters (
  record_parameter_id INTEGER PRIMARY KEY,
  record_id INTEGER NOT NULL REFERENCES records(record_id) ON DELETE CASCADE,
  parameter_id INTEGER NOT NULL REFERENCES parameters(parameter_id) ON DELETE RESTRICT,
  units TEXT NOT NULL DEFAULT '',
  value_count INTEGER,
  value_min REAL,
  value_max REAL,
  value_mean REAL
);

-- Polymorphic annotations: owner is (owner_kind, owner_id), resolved in application code
CREATE TABLE IF NOT EXISTS tags (
  tag_id INTEGER PRIMARY KEY,
  owner_kind TEXT NOT NULL,
  owner_id INTEGER NOT NULL,
  type TEXT NOT NULL,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  comment TEXT NOT NULL DEFAULT '',
  UNIQUE (owner_kind, owner_id, type, key)
);

CREATE TABLE IF NOT EXISTS attachments (
  attachment_id INTEGER PRIMARY KEY,
  owner_kind TEXT NOT NULL,
  owner_id INTEGER NOT NULL,
  type TEXT NOT NULL,
  key TEXT NOT NULL,
  file TEXT NOT NULL,
  comment TEXT NOT NULL DEFAULT '',
  UNIQUE (owner_kind, owner_id, type, key)
);

-- Append-only audit log
CREATE TABLE IF NOT EXISTS revisions (
  revision_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL,
  actor TEXT NOT NULL,
  comment TEXT NOT NULL,
  before_json TEXT NOT NULL DEFAULT '[]',
  after_json TEXT NOT NULL DEFAULT '[]'
);

CREATE INDEX IF NOT EXISTS idx_authorships_publication ON authorships(publication_id);
CREATE INDEX IF NOT EXISTS idx_authorships_person ON authorships(person_id);
CREATE INDEX IF NOT EXISTS idx_record_authorships_person ON record_authorships(person_id);
CREATE INDEX IF NOT EXISTS idx_aliases_person ON aliases(person_id);
CREATE INDEX IF NOT EXISTS idx_features_parent ON features(parent_id);
CREATE INDEX IF NOT EXISTS idx_publications_doi ON publications(doi);
CREATE INDEX IF NOT EXISTS idx_publications_title ON publications(title);
`;

/** Tables counted by `getStats()`. */
export type StatTable =
    | 'people'
    | 'aliases'
    | 'publications'
    | 'authorships'
    | 'features'
    | 'records'
    | 'parameters'
    | 'tags'
    | 'attachments'
    | 'revisions';

/**
 * Curator database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and transactions.
 * Entity reads and writes live in the repositories built on top of it.
 */
export class CuratorDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): Record<StatTable, number> {
        const count = (table: StatTable): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        return {
            people: count('people'),
            aliases: count('aliases'),
            publications: count('publications'),
            authorships: count('authorships'),
            features: count('features'),
            records: count('records'),
            parameters: count('parameters'),
            tags: count('tags'),
            attachments: count('attachments'),
            revisions: count('revisions'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     * Nested calls run as savepoints; a throw rolls back the innermost scope.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for repositories and advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

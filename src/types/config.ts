/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Bibliographic import defaults.
 */
export interface ImportConfig {
    /** Number of CSL-JSON items committed per transaction */
    chunkSize: number;
    /** Replace authorships of publications that already exist */
    updateAuthors: boolean;
    /** Regenerate slugs of publications that already exist */
    regenerateSlugs: boolean;
    /** Store unconsumed CSL-JSON fields as `meta` tags */
    tagResidualFields: boolean;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface CuratorConfig {
    // Storage
    db: string;

    // Audit
    actor: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Import
    import: ImportConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CuratorConfig = {
    db: './paleo-curator.db',
    actor: 'curator',
    logLevel: 'info',
    jsonLogs: false,
    import: {
        chunkSize: 50,
        updateAuthors: true,
        regenerateSlugs: false,
        tagResidualFields: true,
    },
};

#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { importBibtex, importCslJson } from '../bibliography/importer.js';
import { EXPORT_FORMATS, exportPublications, type ExportFormat } from '../exporters/export.js';
import { identifyGeometry, wktBounds } from '../geometry/wkt.js';
import { combinePeople } from '../merge/combine.js';
import { parseEntityKind } from '../storage/entity-registry.js';
import { formatPersonName, openStore, type CuratorStore } from '../storage/index.js';
import type { CuratorConfig, EntityRef } from '../types/index.js';
import { CuratorError, ValidationError } from '../utils/errors.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { getLogger, initLogger, parseLogLevel } from '../utils/logger.js';

const VERSION = '1.0.0';

interface CommonOptions {
    db?: string;
    actor?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface CslImportOptions extends CommonOptions {
    chunkSize?: number;
    updateAuthors?: boolean;
    regenerateSlugs?: boolean;
    meta?: boolean;
}

interface AnnotationOptions extends CommonOptions {
    type?: string;
    comment?: string;
}

const program = new Command();

program
    .name('paleo-curator')
    .description('Curate people, publications, features and records of a paleoclimate research database.')
    .version(VERSION);

// ─── Shared plumbing ──────────────────────────────────────

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'Database path')
        .option('--actor <name>', 'Actor recorded in the revision log')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs');
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`"${value}" is not an integer`);
    }
    return parsed;
}

async function setup(opts: CommonOptions, overrides: ConfigOverrides = {}): Promise<{ config: CuratorConfig; store: CuratorStore }> {
    const logLevel = opts.logLevel === undefined ? undefined : parseLogLevel(opts.logLevel);
    if (opts.logLevel !== undefined && logLevel === undefined) {
        throw new ValidationError(`Unknown log level "${opts.logLevel}"`, { field: 'logLevel' });
    }

    const config = await resolveConfig({
        ...overrides,
        ...(opts.db !== undefined && { db: opts.db }),
        ...(opts.actor !== undefined && { actor: opts.actor }),
        ...(logLevel !== undefined && { logLevel }),
        ...(opts.jsonLogs !== undefined && { jsonLogs: opts.jsonLogs }),
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    return { config, store: openStore(config.db) };
}

/**
 * Run a command body against an open store; report failures and exit 1.
 */
async function run(opts: CommonOptions, body: (store: CuratorStore, config: CuratorConfig) => void, overrides?: ConfigOverrides): Promise<void> {
    let store: CuratorStore | undefined;
    try {
        const opened = await setup(opts, overrides);
        store = opened.store;
        body(opened.store, opened.config);
    } catch (error) {
        const message = error instanceof ValidationError ? error.format() : error instanceof Error ? error.message : String(error);
        getLogger().error({ error: error instanceof CuratorError ? error.name : error }, message);
        process.exitCode = 1;
    } finally {
        store?.db.close();
    }
}

function entityRef(kind: string, id: number): EntityRef {
    const parsed = parseEntityKind(kind);
    if (parsed === undefined) {
        throw new ValidationError(`Unknown entity kind "${kind}"`, { field: 'kind' });
    }
    return { kind: parsed, id };
}

// ─── INIT command ─────────────────────────────────────────

withCommonOptions(program.command('init'))
    .description('Create or migrate the database')
    .action(async (opts: CommonOptions) => {
        await run(opts, (_store, config) => {
            console.log(`Database ready: ${config.db}`);
        });
    });

// ─── IMPORT commands ──────────────────────────────────────

withCommonOptions(program.command('import-bibtex'))
    .description('Import a BibTeX file in one revision')
    .argument('<file>', 'BibTeX file')
    .option('--no-update-authors', 'Keep authorships of publications already in the database')
    .action(async (file: string, opts: CommonOptions & { updateAuthors?: boolean }) => {
        await run(opts, (store, config) => {
            const publications = importBibtex(store, readFileSync(file, 'utf-8'), {
                actor: config.actor,
                updateAuthors: opts.updateAuthors ?? config.import.updateAuthors,
            });
            for (const publication of publications) {
                console.log(`  ${publication.slug}  ${publication.title}`);
            }
            console.log(`Imported ${publications.length} publication(s)`);
        });
    });

withCommonOptions(program.command('import-csl'))
    .description('Import a CSL-JSON file, committing one revision per chunk')
    .argument('<file>', 'CSL-JSON file')
    .option('--chunk-size <n>', 'Items per transaction', parseInteger)
    .option('--no-update-authors', 'Keep authorships of publications already in the database')
    .option('--regenerate-slugs', 'Regenerate slugs of publications already in the database')
    .option('--no-meta', 'Do not store unconsumed fields as meta tags')
    .action(async (file: string, opts: CslImportOptions) => {
        const overrides: ConfigOverrides = {
            import: {
                ...(opts.chunkSize !== undefined && { chunkSize: opts.chunkSize }),
                ...(opts.updateAuthors === false && { updateAuthors: false }),
                ...(opts.regenerateSlugs === true && { regenerateSlugs: true }),
                ...(opts.meta === false && { tagResidualFields: false }),
            },
        };

        await run(
            opts,
            (store, config) => {
                const publications = importCslJson(store, readFileSync(file, 'utf-8'), {
                    actor: config.actor,
                    ...config.import,
                });
                console.log(`Imported ${publications.length} publication(s)`);
            },
            overrides
        );
    });

// ─── COMBINE command ──────────────────────────────────────

withCommonOptions(program.command('combine'))
    .description('Merge duplicate people into the one with the most authorships')
    .argument('<ids...>', 'Person ids')
    .option('--comment <text>', 'Revision comment')
    .action(async (ids: string[], opts: CommonOptions & { comment?: string }) => {
        await run(opts, (store, config) => {
            const result = combinePeople(store, ids.map(parseInteger), {
                actor: config.actor,
                ...(opts.comment !== undefined && { comment: opts.comment }),
            });
            if (!result.ok) {
                console.log(result.error.message);
                return;
            }
            console.log(`Kept ${formatPersonName(result.survivor)} (#${result.survivor.person_id})`);
            for (const loser of result.removed) {
                console.log(
                    `  removed #${loser.person.person_id}: ${loser.authorships} authorship(s), ${loser.aliases} alias(es), ` +
                        `${loser.annotationsMoved} annotation(s) moved, ${loser.annotationsDiscarded} discarded`
                );
            }
        });
    });

// ─── WKT command ──────────────────────────────────────────

program
    .command('wkt')
    .description('Identify a WKT geometry and print its bounding box')
    .argument('<text>', 'Well-known text')
    .action((text: string) => {
        const type = identifyGeometry(text);
        if (type === null) {
            console.error('Not valid well-known text');
            process.exitCode = 1;
            return;
        }
        const bounds = wktBounds(text);
        console.log(`Type:   ${type}`);
        console.log(`Bounds: x ${bounds.xmin ?? '-'} .. ${bounds.xmax ?? '-'}, y ${bounds.ymin ?? '-'} .. ${bounds.ymax ?? '-'}`);
    });

// ─── ANNOTATION commands ──────────────────────────────────

withCommonOptions(program.command('tag'))
    .description('Attach a tag to an entity')
    .argument('<kind>', 'person | publication | feature | record | parameter')
    .argument('<id>', 'Entity id', parseInteger)
    .argument('<key>', 'Tag key')
    .argument('<value>', 'Tag value')
    .option('--type <type>', 'Tag type', 'tag')
    .option('--comment <text>', 'Comment')
    .action(async (kind: string, id: number, key: string, value: string, opts: AnnotationOptions) => {
        await run(opts, (store, config) => {
            const owner = entityRef(kind, id);
            store.revisions.run({ actor: config.actor, comment: `Tag ${kind} ${id} with ${key}` }, (scope) => {
                scope.touch(owner);
                store.annotations.attachTag(owner, {
                    key,
                    value,
                    ...(opts.type !== undefined && { type: opts.type }),
                    ...(opts.comment !== undefined && { comment: opts.comment }),
                });
            });
            console.log(`Tagged ${kind} ${id}: ${key} = ${value}`);
        });
    });

withCommonOptions(program.command('tags'))
    .description('List tags and attachments of an entity')
    .argument('<kind>', 'person | publication | feature | record | parameter')
    .argument('<id>', 'Entity id', parseInteger)
    .option('--type <type>', 'Only this tag type')
    .action(async (kind: string, id: number, opts: AnnotationOptions) => {
        await run(opts, (store) => {
            const owner = entityRef(kind, id);
            for (const tag of store.annotations.listTags(owner, opts.type)) {
                console.log(`  [${tag.type}] ${tag.key} = ${tag.value}${tag.comment ? `  (${tag.comment})` : ''}`);
            }
            for (const attachment of store.annotations.listAttachments(owner, opts.type)) {
                console.log(`  [${attachment.type}] ${attachment.key} -> ${attachment.file}`);
            }
        });
    });

withCommonOptions(program.command('untag'))
    .description('Remove a tag from an entity')
    .argument('<kind>', 'person | publication | feature | record | parameter')
    .argument('<id>', 'Entity id', parseInteger)
    .argument('<key>', 'Tag key')
    .option('--type <type>', 'Tag type', 'tag')
    .action(async (kind: string, id: number, key: string, opts: AnnotationOptions) => {
        await run(opts, (store, config) => {
            const owner = entityRef(kind, id);
            const type = opts.type ?? 'tag';
            const removed = store.revisions.run({ actor: config.actor, comment: `Untag ${kind} ${id} ${key}` }, (scope) => {
                scope.touch(owner);
                return store.annotations.deleteTag(owner, type, key);
            });
            console.log(removed ? `Removed ${type}:${key}` : `No ${type}:${key} on ${kind} ${id}`);
        });
    });

// ─── EXPORT command ───────────────────────────────────────

withCommonOptions(program.command('export'))
    .description('Export publications to CSL-JSON or BibTeX')
    .requiredOption('-f, --format <format>', 'Export format: csl-json | bibtex')
    .option('-o, --out <path>', 'Output file path')
    .action(async (opts: CommonOptions & { format: string; out?: string }) => {
        const format = EXPORT_FORMATS.find((candidate) => candidate === opts.format.toLowerCase());
        if (format === undefined) {
            console.error(`Invalid format: ${opts.format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exitCode = 1;
            return;
        }

        const extensions: Record<ExportFormat, string> = { 'csl-json': '.json', bibtex: '.bib' };
        await run(opts, (store) => {
            const outputPath = opts.out ?? `publications${extensions[format]}`;
            const count = exportPublications(store, outputPath, format);
            console.log(`Exported ${count} publication(s) to ${outputPath}`);
        });
    });

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect'))
    .description('Show database statistics')
    .action(async (opts: CommonOptions) => {
        await run(opts, (store, config) => {
            const stats = store.db.getStats();
            console.log(`\nDatabase ${config.db}\n`);
            for (const [table, count] of Object.entries(stats)) {
                console.log(`  ${table.padEnd(13)} ${count}`);
            }
            console.log('');
        });
    });

// ─── HISTORY command ──────────────────────────────────────

withCommonOptions(program.command('history'))
    .description('List recent revisions')
    .option('-n, --limit <n>', 'Number of revisions', parseInteger, 20)
    .action(async (opts: CommonOptions & { limit: number }) => {
        await run(opts, (store) => {
            for (const revision of store.revisions.list(opts.limit)) {
                console.log(
                    `#${revision.revision_id}  ${revision.created_at}  ${revision.actor}  ${revision.comment}  (${revision.after.length} entities)`
                );
            }
        });
    });

await program.parseAsync();

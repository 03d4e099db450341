import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CuratorConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Shape accepted in paleo-curator.config.json. Every key is optional.
 */
const ConfigFileSchema = z
    .object({
        db: z.string().min(1),
        actor: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
        import: z
            .object({
                chunkSize: z.number().int().positive(),
                updateAuthors: z.boolean(),
                regenerateSlugs: z.boolean(),
                tagResidualFields: z.boolean(),
            })
            .partial(),
    })
    .partial()
    .strict();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

/**
 * Load configuration from paleo-curator.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply then.
 */
async function loadConfigFile(): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('paleo-curator', {
        searchPlaces: ['package.json', 'paleo-curator.config.json'],
    });

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (env['PALEO_CURATOR_DB']) overrides.db = env['PALEO_CURATOR_DB'];
    if (env['PALEO_CURATOR_ACTOR']) overrides.actor = env['PALEO_CURATOR_ACTOR'];

    return overrides;
}

/**
 * Merge configuration layers.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(
    fileConfig: ConfigOverrides | null,
    envConfig: ConfigOverrides,
    cliFlags: ConfigOverrides
): CuratorConfig {
    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        import: {
            ...DEFAULT_CONFIG.import,
            ...fileConfig?.import,
            ...envConfig.import,
            ...cliFlags.import,
        },
    };
}

/**
 * Resolve the effective configuration for a CLI invocation.
 */
export async function resolveConfig(cliFlags: ConfigOverrides): Promise<CuratorConfig> {
    const fileConfig = await loadConfigFile();
    return mergeConfig(fileConfig, loadEnvVars(), cliFlags);
}

import { cosmiconfig } from 'cosmiconfig';
import {
    CARD_TYPES,
    DEFAULT_CONFIG,
    LOG_LEVELS,
    PHRASE_CATEGORIES,
    type CardType,
    type DeckMinerConfig,
    type LogLevel,
    type PhraseCategory,
} from '../types/index.js';
import { getLogger } from './logger.js';

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
    return values.some((v) => v === value);
}

function isPositiveInt(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Keep only the recognised, well-typed keys of a config-file object.
 * Anything else is reported and dropped.
 */
export function sanitizeConfig(raw: unknown): Partial<DeckMinerConfig> {
    const config: Partial<DeckMinerConfig> = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        getLogger().warn('Config file must contain a JSON object, ignoring it');
        return config;
    }

    const rejected: string[] = [];
    const entries: [string, unknown][] = Object.entries(raw);

    for (const [key, value] of entries) {
        switch (key) {
            case 'outputDir':
            case 'stopwordsFile':
                if (typeof value === 'string' && value.length > 0) config[key] = value;
                else rejected.push(key);
                break;
            case 'topN':
            case 'vizTopN':
            case 'barWidth':
            case 'phrasesPerWord':
                if (isPositiveInt(value)) config[key] = value;
                else rejected.push(key);
                break;
            case 'includePhrases':
            case 'jsonLogs':
                if (typeof value === 'boolean') config[key] = value;
                else rejected.push(key);
                break;
            case 'language':
                if (value === 'de') config.language = value;
                else rejected.push(key);
                break;
            case 'extraStopwords':
                if (Array.isArray(value) && value.every((w): w is string => typeof w === 'string')) {
                    config.extraStopwords = value.map((w) => w.toLowerCase());
                } else {
                    rejected.push(key);
                }
                break;
            case 'cardType':
                if (isOneOf<CardType>(CARD_TYPES, value)) config.cardType = value;
                else rejected.push(key);
                break;
            case 'phraseCategory':
                if (isOneOf<PhraseCategory>(PHRASE_CATEGORIES, value)) config.phraseCategory = value;
                else rejected.push(key);
                break;
            case 'logLevel':
                if (isOneOf<LogLevel>(LOG_LEVELS, value)) config.logLevel = value;
                else rejected.push(key);
                break;
            default:
                rejected.push(key);
        }
    }

    if (rejected.length > 0) {
        getLogger().warn({ keys: rejected }, 'Ignoring unknown or invalid config keys');
    }

    return config;
}

/**
 * Load configuration from deckminer.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<DeckMinerConfig> | null> {
    const explorer = cosmiconfig('deckminer', {
        searchPlaces: ['deckminer.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return sanitizeConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<DeckMinerConfig> {
    const config: Partial<DeckMinerConfig> = {};

    const level = env['DECKMINER_LOG_LEVEL'];
    if (isOneOf<LogLevel>(LOG_LEVELS, level)) {
        config.logLevel = level;
    }

    const outputDir = env['DECKMINER_OUTPUT_DIR'];
    if (outputDir) {
        config.outputDir = outputDir;
    }

    return config;
}

/**
 * Drop keys whose value is undefined so they don't shadow lower-precedence sources.
 */
function defined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) result[key] = value[key];
    }
    return result;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<DeckMinerConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<DeckMinerConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...defined(cliFlags),
        extraStopwords: [
            ...(fileConfig?.extraStopwords ?? DEFAULT_CONFIG.extraStopwords),
            ...(cliFlags.extraStopwords ?? []),
        ],
    };
}

/**
 * Environment configuration.
 *
 * Every variable is declared in `EnvSchema` with its validation rule and
 * default. `config` is parsed once when the module loads; tests and embedders
 * can call `loadConfig` with their own environment object.
 */

import { z } from 'zod';
import { ConfigurationError, type ConfigIssue } from './errors/EngineErrors';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const DifficultyNameSchema = z.enum(['beginner', 'easy', 'medium', 'hard', 'expert']);
export type DifficultyName = z.infer<typeof DifficultyNameSchema>;

export const PlayStyleNameSchema = z.enum(['aggressive', 'defensive', 'positional', 'balanced']);
export type PlayStyleName = z.infer<typeof PlayStyleNameSchema>;

export const EnvSchema = z.object({
    /** Values outside the known set (e.g. `staging`) run as development */
    NODE_ENV: NodeEnvSchema.catch('development'),

    GOMOKU_LOG_LEVEL: LogLevelSchema.default('info'),
    GOMOKU_LOG_FORMAT: LogFormatSchema.default('pretty'),

    /** Board edge length for new games */
    GOMOKU_BOARD_SIZE: z.coerce.number().int().min(15).max(100).default(15),

    GOMOKU_DIFFICULTY: DifficultyNameSchema.default('medium'),
    GOMOKU_PLAY_STYLE: PlayStyleNameSchema.default('balanced'),

    /** Wall-clock budget for a time-boxed search, in milliseconds */
    GOMOKU_TIME_LIMIT_MS: z.coerce.number().int().positive().optional(),

    /** Seed for the random fallback move */
    GOMOKU_SEED: z.coerce.number().int().optional()
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EngineConfig {
    nodeEnv: NodeEnv;
    logging: {
        level: LogLevel;
        format: LogFormat;
    };
    boardSize: number;
    search: {
        difficulty: DifficultyName;
        playStyle: PlayStyleName;
        timeLimitMs: number | null;
        seed: number | null;
    };
}

export type EnvValidationResult =
    | { success: true; data: RawEnv }
    | { success: false; errors: ConfigIssue[] };

type EnvSource = Record<string, string | undefined>;

/**
 * Validates an environment object without throwing
 */
export function parseEnv(env: EnvSource = process.env): EnvValidationResult {
    const result = EnvSchema.safeParse(env);

    if (!result.success) {
        return {
            success: false,
            errors: result.error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message
            }))
        };
    }

    return { success: true, data: result.data };
}

/**
 * Parses the environment into an `EngineConfig`, throwing `ConfigurationError` on bad input
 */
export function loadConfig(env: EnvSource = process.env): EngineConfig {
    const result = parseEnv(env);
    if (!result.success) {
        throw new ConfigurationError(result.errors);
    }

    const raw = result.data;
    return {
        nodeEnv: raw.NODE_ENV,
        logging: {
            level: raw.GOMOKU_LOG_LEVEL,
            format: raw.GOMOKU_LOG_FORMAT
        },
        boardSize: raw.GOMOKU_BOARD_SIZE,
        search: {
            difficulty: raw.GOMOKU_DIFFICULTY,
            playStyle: raw.GOMOKU_PLAY_STYLE,
            timeLimitMs: raw.GOMOKU_TIME_LIMIT_MS ?? null,
            seed: raw.GOMOKU_SEED ?? null
        }
    };
}

export const config: EngineConfig = loadConfig();

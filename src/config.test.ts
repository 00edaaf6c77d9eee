import { describe, it, expect } from 'vitest';
import { loadConfig, parseEnv } from './config';
import { ConfigurationError } from './errors/EngineErrors';

describe('config', () => {
    describe('loadConfig', () => {
        it('applies defaults to an empty environment', () => {
            expect(loadConfig({})).toEqual({
                nodeEnv: 'development',
                logging: { level: 'info', format: 'pretty' },
                boardSize: 15,
                search: { difficulty: 'medium', playStyle: 'balanced', timeLimitMs: null, seed: null }
            });
        });

        it('reads every variable', () => {
            const config = loadConfig({
                NODE_ENV: 'production',
                GOMOKU_LOG_LEVEL: 'debug',
                GOMOKU_LOG_FORMAT: 'json',
                GOMOKU_BOARD_SIZE: '19',
                GOMOKU_DIFFICULTY: 'expert',
                GOMOKU_PLAY_STYLE: 'positional',
                GOMOKU_TIME_LIMIT_MS: '1500',
                GOMOKU_SEED: '42'
            });

            expect(config).toEqual({
                nodeEnv: 'production',
                logging: { level: 'debug', format: 'json' },
                boardSize: 19,
                search: { difficulty: 'expert', playStyle: 'positional', timeLimitMs: 1500, seed: 42 }
            });
        });

        it('falls back to development for an unknown NODE_ENV', () => {
            expect(loadConfig({ NODE_ENV: 'staging' }).nodeEnv).toBe('development');
            expect(parseEnv({ NODE_ENV: 'staging' }).success).toBe(true);
        });

        it('ignores unrelated variables', () => {
            expect(loadConfig({ HOME: '/tmp', GOMOKU_BOARD_SIZE: '100' }).boardSize).toBe(100);
        });

        it('throws ConfigurationError naming the bad variable', () => {
            let caught: unknown;
            try {
                loadConfig({ GOMOKU_BOARD_SIZE: '12' });
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(ConfigurationError);
            if (caught instanceof ConfigurationError) {
                expect(caught.issues.map(issue => issue.path)).toEqual(['GOMOKU_BOARD_SIZE']);
                expect(caught.message).toMatch(/^Invalid configuration: GOMOKU_BOARD_SIZE: /);
            }
        });
    });

    describe('parseEnv', () => {
        it('reports every invalid variable without throwing', () => {
            const result = parseEnv({ GOMOKU_DIFFICULTY: 'impossible', GOMOKU_SEED: 'abc' });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.errors.map(issue => issue.path)).toEqual(['GOMOKU_DIFFICULTY', 'GOMOKU_SEED']);
            }
        });

        it('rejects a non-positive time limit', () => {
            const result = parseEnv({ GOMOKU_TIME_LIMIT_MS: '0' });
            expect(result.success).toBe(false);
        });

        it('returns the parsed values on success', () => {
            const result = parseEnv({ GOMOKU_PLAY_STYLE: 'defensive' });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.GOMOKU_PLAY_STYLE).toBe('defensive');
                expect(result.data.GOMOKU_BOARD_SIZE).toBe(15);
            }
        });
    });
});

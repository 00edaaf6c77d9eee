export { Board } from './core/Board';
export type { BoardBounds } from './core/Board';
export { Game } from './core/Game';
export { RuleEngine, WIN_LENGTH } from './core/RuleEngine';
export { Cell, GameState, MoveResult, PatternType, OUT_OF_BOUNDS, isPlayer, opponentOf } from './core/types';
export type { Position, Player, Move, Grid, ReadonlyGrid } from './core/types';
export * from './ai';
export { config, loadConfig, parseEnv } from './config';
export type { EngineConfig } from './config';
export { EngineError, EngineErrorCode, ConfigurationError, NoMoveError, isEngineError } from './errors/EngineErrors';
export { logger, getLogger } from './utils/logger';

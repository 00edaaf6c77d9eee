/**
 * Represents a position on the board
 */
export interface Position {
    row: number;
    col: number;
}

/**
 * Contents of a single cell. The numeric values are part of the public contract.
 */
export enum Cell {
    EMPTY = 0,
    PLAYER_ONE = 1,
    PLAYER_TWO = 2
}

/**
 * A cell value that belongs to a player
 */
export type Player = Cell.PLAYER_ONE | Cell.PLAYER_TWO;

/**
 * Returned by `getCell` for coordinates outside the grid
 */
export const OUT_OF_BOUNDS = -1;

export type Grid = Cell[][];
export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<Cell>>;

/**
 * Represents the state of the game
 */
export enum GameState {
    PLAYING = 'PLAYING',
    PLAYER1_WIN = 'PLAYER1_WIN',
    PLAYER2_WIN = 'PLAYER2_WIN',
    DRAW = 'DRAW'
}

/**
 * Outcome of validating a move against the rules
 */
export enum MoveResult {
    VALID = 'VALID',
    OUT_OF_BOUNDS = 'OUT_OF_BOUNDS',
    CELL_OCCUPIED = 'CELL_OCCUPIED',
    INVALID_PLAYER = 'INVALID_PLAYER'
}

/**
 * Threat tiers of a run through a cell, weakest first
 */
export enum PatternType {
    NONE = 'NONE',
    SINGLE = 'SINGLE',
    PAIR = 'PAIR',
    THREE_SEMI = 'THREE_SEMI',
    THREE_OPEN = 'THREE_OPEN',
    FOUR_SEMI = 'FOUR_SEMI',
    FOUR_OPEN = 'FOUR_OPEN',
    FIVE = 'FIVE'
}

/**
 * Represents a move in the game
 */
export interface Move {
    row: number;
    col: number;
    player: Player;
}

export function isPlayer(value: number): value is Player {
    return value === Cell.PLAYER_ONE || value === Cell.PLAYER_TWO;
}

export function opponentOf(player: Player): Player {
    return player === Cell.PLAYER_ONE ? Cell.PLAYER_TWO : Cell.PLAYER_ONE;
}

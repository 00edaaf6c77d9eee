import { Cell, GameState, MoveResult, PatternType, Position, ReadonlyGrid, isPlayer, opponentOf } from './types';

/** Number of stones in a row needed to win */
export const WIN_LENGTH = 5;

interface Direction {
    dr: number;
    dc: number;
}

const DIRECTIONS: readonly Direction[] = [
    { dr: 0, dc: 1 },  // Horizontal
    { dr: 1, dc: 0 },  // Vertical
    { dr: 1, dc: 1 },  // Diagonal \
    { dr: 1, dc: -1 }  // Diagonal /
];

const PATTERN_SCORES: Record<PatternType, number> = {
    [PatternType.NONE]: 0,
    [PatternType.SINGLE]: 1,
    [PatternType.PAIR]: 10,
    [PatternType.THREE_SEMI]: 100,
    [PatternType.THREE_OPEN]: 1000,
    [PatternType.FOUR_SEMI]: 10000,
    [PatternType.FOUR_OPEN]: 100000,
    [PatternType.FIVE]: 1000000
};

const GAME_STATE_LABELS: Record<GameState, string> = {
    [GameState.PLAYING]: 'Playing',
    [GameState.PLAYER1_WIN]: 'Player 1 wins',
    [GameState.PLAYER2_WIN]: 'Player 2 wins',
    [GameState.DRAW]: 'Draw'
};

const PATTERN_LABELS: Record<PatternType, string> = {
    [PatternType.NONE]: 'none',
    [PatternType.SINGLE]: 'single',
    [PatternType.PAIR]: 'pair',
    [PatternType.THREE_SEMI]: 'semi-open three',
    [PatternType.THREE_OPEN]: 'open three',
    [PatternType.FOUR_SEMI]: 'semi-open four',
    [PatternType.FOUR_OPEN]: 'open four',
    [PatternType.FIVE]: 'five'
};

/**
 * Rules of five-in-a-row as pure functions over a grid.
 *
 * Nothing here mutates the grid it is given. Win detection is always local to
 * one cell: `checkGameState` only looks at the last move, which is sound as
 * long as stones are only ever added through `Board.makeMove`, so a new line
 * of five must run through the stone that was just placed.
 */
export class RuleEngine {
    /**
     * Validates a move. Checked in order: player, bounds, occupancy.
     */
    public static validateMove(grid: ReadonlyGrid, row: number, col: number, player: number): MoveResult {
        if (!isPlayer(player)) {
            return MoveResult.INVALID_PLAYER;
        }
        if (!RuleEngine.isInBounds(grid, row, col)) {
            return MoveResult.OUT_OF_BOUNDS;
        }
        if (grid[row][col] !== Cell.EMPTY) {
            return MoveResult.CELL_OCCUPIED;
        }
        return MoveResult.VALID;
    }

    /**
     * Determines the game state after the move at (lastRow, lastCol); pass -1 when no move has been made
     */
    public static checkGameState(grid: ReadonlyGrid, lastRow = -1, lastCol = -1): GameState {
        if (RuleEngine.isInBounds(grid, lastRow, lastCol)) {
            const lastPlayer = grid[lastRow][lastCol];
            if (isPlayer(lastPlayer) && RuleEngine.checkWinAtPosition(grid, lastRow, lastCol, lastPlayer)) {
                return lastPlayer === Cell.PLAYER_ONE ? GameState.PLAYER1_WIN : GameState.PLAYER2_WIN;
            }
        }

        const full = grid.every(row => row.every(cell => cell !== Cell.EMPTY));
        return full ? GameState.DRAW : GameState.PLAYING;
    }

    /**
     * True when (row, col) holds `player` and a run of at least five passes through it
     */
    public static checkWinAtPosition(grid: ReadonlyGrid, row: number, col: number, player: number): boolean {
        if (!RuleEngine.isInBounds(grid, row, col) || !isPlayer(player) || grid[row][col] !== player) {
            return false;
        }

        return DIRECTIONS.some(({ dr, dc }) => RuleEngine.countInLine(grid, row, col, dr, dc, player) >= WIN_LENGTH);
    }

    /**
     * Counts `player` stones starting at (row, col) and stepping by (dr, dc), inclusive of the start
     */
    public static countConsecutive(
        grid: ReadonlyGrid,
        row: number,
        col: number,
        dr: number,
        dc: number,
        player: number
    ): number {
        let count = 0;
        let r = row;
        let c = col;
        while (RuleEngine.isInBounds(grid, r, c) && grid[r][c] === player) {
            count++;
            r += dr;
            c += dc;
        }
        return count;
    }

    /**
     * Length of the run through (row, col) along one axis. The centre only counts when it holds `player`.
     */
    public static countInLine(
        grid: ReadonlyGrid,
        row: number,
        col: number,
        dr: number,
        dc: number,
        player: number
    ): number {
        const forward = RuleEngine.countConsecutive(grid, row + dr, col + dc, dr, dc, player);
        const backward = RuleEngine.countConsecutive(grid, row - dr, col - dc, -dr, -dc, player);
        const center = RuleEngine.isInBounds(grid, row, col) && grid[row][col] === player ? 1 : 0;
        return forward + backward + center;
    }

    /**
     * Classifies the run `player` has (or would have, on an empty cell) through (row, col) along (dr, dc).
     * A cell held by the opponent has no pattern.
     */
    public static getPattern(
        grid: ReadonlyGrid,
        row: number,
        col: number,
        dr: number,
        dc: number,
        player: number
    ): PatternType {
        if (!RuleEngine.isInBounds(grid, row, col) || !isPlayer(player)) {
            return PatternType.NONE;
        }
        const cell = grid[row][col];
        if (cell !== Cell.EMPTY && cell !== player) {
            return PatternType.NONE;
        }

        const forward = RuleEngine.countConsecutive(grid, row + dr, col + dc, dr, dc, player);
        const backward = RuleEngine.countConsecutive(grid, row - dr, col - dc, -dr, -dc, player);
        const consecutiveCount = forward + backward + 1;

        let openEnds = 0;
        if (RuleEngine.isEmptyCell(grid, row + dr * (forward + 1), col + dc * (forward + 1))) {
            openEnds++;
        }
        if (RuleEngine.isEmptyCell(grid, row - dr * (backward + 1), col - dc * (backward + 1))) {
            openEnds++;
        }

        return RuleEngine.classifyPattern(consecutiveCount, openEnds);
    }

    /**
     * Maps a run length and its open ends to a pattern tier. Fours and threes blocked at both ends are dead.
     */
    public static classifyPattern(consecutiveCount: number, openEnds: number): PatternType {
        if (consecutiveCount >= WIN_LENGTH) {
            return PatternType.FIVE;
        }
        if (consecutiveCount === 4) {
            if (openEnds >= 2) return PatternType.FOUR_OPEN;
            if (openEnds === 1) return PatternType.FOUR_SEMI;
            return PatternType.NONE;
        }
        if (consecutiveCount === 3) {
            if (openEnds >= 2) return PatternType.THREE_OPEN;
            if (openEnds === 1) return PatternType.THREE_SEMI;
            return PatternType.NONE;
        }
        if (consecutiveCount === 2) {
            return PatternType.PAIR;
        }
        if (consecutiveCount === 1) {
            return PatternType.SINGLE;
        }
        return PatternType.NONE;
    }

    public static getPatternScore(pattern: PatternType): number {
        return PATTERN_SCORES[pattern];
    }

    /**
     * Sum of the four directional pattern scores at (row, col) for `player`
     */
    public static evaluatePosition(grid: ReadonlyGrid, row: number, col: number, player: number): number {
        let score = 0;
        for (const { dr, dc } of DIRECTIONS) {
            score += PATTERN_SCORES[RuleEngine.getPattern(grid, row, col, dr, dc, player)];
        }
        return score;
    }

    /**
     * Sum of `evaluatePosition` over every empty cell
     */
    public static evaluateBoard(grid: ReadonlyGrid, player: number): number {
        let total = 0;
        for (let row = 0; row < grid.length; row++) {
            for (let col = 0; col < grid[row].length; col++) {
                if (grid[row][col] === Cell.EMPTY) {
                    total += RuleEngine.evaluatePosition(grid, row, col, player);
                }
            }
        }
        return total;
    }

    /**
     * Would `player` complete five by playing the empty cell (row, col)?
     */
    public static isWinningThreat(grid: ReadonlyGrid, row: number, col: number, player: number): boolean {
        if (!isPlayer(player) || !RuleEngine.isEmptyCell(grid, row, col)) {
            return false;
        }

        // Same result as placing the stone on a copy and calling checkWinAtPosition
        return DIRECTIONS.some(({ dr, dc }) => {
            const forward = RuleEngine.countConsecutive(grid, row + dr, col + dc, dr, dc, player);
            const backward = RuleEngine.countConsecutive(grid, row - dr, col - dc, -dr, -dc, player);
            return forward + backward + 1 >= WIN_LENGTH;
        });
    }

    /**
     * Would playing (row, col) stop the opponent of `player` from completing five there?
     */
    public static isBlockingThreat(grid: ReadonlyGrid, row: number, col: number, player: number): boolean {
        if (!isPlayer(player)) {
            return false;
        }
        return RuleEngine.isWinningThreat(grid, row, col, opponentOf(player));
    }

    /**
     * Every empty cell where `player` would win immediately, row-major
     */
    public static findThreats(grid: ReadonlyGrid, player: number): Position[] {
        const threats: Position[] = [];
        for (let row = 0; row < grid.length; row++) {
            for (let col = 0; col < grid[row].length; col++) {
                if (RuleEngine.isWinningThreat(grid, row, col, player)) {
                    threats.push({ row, col });
                }
            }
        }
        return threats;
    }

    public static gameStateToString(state: GameState): string {
        return GAME_STATE_LABELS[state];
    }

    public static patternTypeToString(pattern: PatternType): string {
        return PATTERN_LABELS[pattern];
    }

    public static isInBounds(grid: ReadonlyGrid, row: number, col: number): boolean {
        return (
            Number.isInteger(row) &&
            Number.isInteger(col) &&
            row >= 0 &&
            row < grid.length &&
            col >= 0 &&
            col < grid.length
        );
    }

    private static isEmptyCell(grid: ReadonlyGrid, row: number, col: number): boolean {
        return RuleEngine.isInBounds(grid, row, col) && grid[row][col] === Cell.EMPTY;
    }
}

import { Board } from '../core/Board';
import { RuleEngine } from '../core/RuleEngine';
import { Cell, Player, Position, ReadonlyGrid, isPlayer, opponentOf } from '../core/types';
import type { DifficultyName, EngineConfig, PlayStyleName } from '../config';
import { getLogger } from '../utils/logger';
import { RandomSource, createRandomSource, pickRandom } from './random';

const log = getLogger('SearchEngine');

/**
 * Difficulty levels; the value is the search depth in plies
 */
export enum Difficulty {
    BEGINNER = 1,
    EASY = 2,
    MEDIUM = 4,
    HARD = 6,
    EXPERT = 8
}

export enum PlayStyle {
    AGGRESSIVE = 'AGGRESSIVE',
    DEFENSIVE = 'DEFENSIVE',
    BALANCED = 'BALANCED',
    POSITIONAL = 'POSITIONAL'
}

const MAX_CANDIDATES: Record<Difficulty, number> = {
    [Difficulty.BEGINNER]: 8,
    [Difficulty.EASY]: 12,
    [Difficulty.MEDIUM]: 16,
    [Difficulty.HARD]: 20,
    [Difficulty.EXPERT]: 25
};

const DIFFICULTY_BY_NAME: Record<DifficultyName, Difficulty> = {
    beginner: Difficulty.BEGINNER,
    easy: Difficulty.EASY,
    medium: Difficulty.MEDIUM,
    hard: Difficulty.HARD,
    expert: Difficulty.EXPERT
};

const PLAY_STYLE_BY_NAME: Record<PlayStyleName, PlayStyle> = {
    aggressive: PlayStyle.AGGRESSIVE,
    defensive: PlayStyle.DEFENSIVE,
    positional: PlayStyle.POSITIONAL,
    balanced: PlayStyle.BALANCED
};

export const OPENING_SCORE = 1000;
export const WIN_MOVE_SCORE = 1000000;
export const BLOCK_MOVE_SCORE = 999999;
/** Score of a decided game inside the tree; larger than any static evaluation */
export const TERMINAL_SCORE = 1000000000;

const SEARCH_RADIUS = 2;
const CENTER_RADIUS = 3;
const MAX_TOP_MOVES_DEPTH = 4;
const MAX_DEPTH_LIMIT = 10;

/**
 * A chosen cell and the score the search gave it
 */
export interface SearchResult {
    row: number;
    col: number;
    score: number;
}

/**
 * Diagnostics of the last search call. Never read by game logic.
 */
export interface ThinkingStats {
    nodesVisited: number;
    prunes: number;
    maxDepthReached: number;
    /** Deepest full iteration finished by a time-boxed search */
    completedDepth: number;
    elapsedMs: number;
}

export interface SearchEngineOptions {
    aiPlayer?: number;
    difficulty?: Difficulty;
    playStyle?: PlayStyle;
    /** Wall-clock budget; when set, `findBestMove` deepens iteratively until it runs out */
    timeLimitMs?: number | null;
    /** Overrides the depth of the difficulty profile */
    maxDepth?: number;
    /** Overrides the candidate cap of the difficulty profile */
    maxCandidates?: number;
    /** Disable to run plain minimax over the same candidates */
    alphaBeta?: boolean;
    random?: RandomSource;
    now?: () => number;
}

interface SearchContext {
    board: Board;
    ai: Player;
    opponent: Player;
    rootDepth: number;
}

function emptyStats(): ThinkingStats {
    return { nodesVisited: 0, prunes: 0, maxDepthReached: 0, completedDepth: 0, elapsedMs: 0 };
}

function clampInt(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, Math.floor(value)));
}

/**
 * Picks moves with depth-limited minimax and alpha-beta pruning.
 *
 * Each call copies the caller's grid once into a search-owned `Board`; every
 * trial move is made on that board and undone before its sibling is tried, so
 * the caller's grid is never touched. Immediate wins and forced blocks are
 * answered without searching, and only cells near existing stones are ever
 * considered.
 */
export class SearchEngine {
    private aiPlayer: number;
    private difficulty: Difficulty;
    private playStyle: PlayStyle;
    private timeLimitMs: number | null;
    private maxDepth: number;
    private maxCandidates: number;
    private readonly alphaBeta: boolean;
    private readonly random: RandomSource;
    private readonly now: () => number;
    private stats: ThinkingStats = emptyStats();

    constructor(options: SearchEngineOptions = {}) {
        this.aiPlayer = options.aiPlayer ?? Cell.PLAYER_TWO;
        this.difficulty = options.difficulty ?? Difficulty.MEDIUM;
        this.playStyle = options.playStyle ?? PlayStyle.BALANCED;
        this.timeLimitMs = options.timeLimitMs ?? null;
        this.alphaBeta = options.alphaBeta ?? true;
        this.random = options.random ?? createRandomSource();
        this.now = options.now ?? (() => performance.now());

        this.maxDepth = this.difficulty;
        this.maxCandidates = MAX_CANDIDATES[this.difficulty];
        if (options.maxDepth !== undefined) {
            this.maxDepth = clampInt(options.maxDepth, 1, MAX_DEPTH_LIMIT);
        }
        if (options.maxCandidates !== undefined) {
            this.maxCandidates = clampInt(options.maxCandidates, 1, Number.MAX_SAFE_INTEGER);
        }
    }

    /**
     * Builds an engine from the `search` section of the environment config
     */
    public static fromConfig(search: EngineConfig['search'], options: SearchEngineOptions = {}): SearchEngine {
        return new SearchEngine({
            difficulty: DIFFICULTY_BY_NAME[search.difficulty],
            playStyle: PLAY_STYLE_BY_NAME[search.playStyle],
            timeLimitMs: search.timeLimitMs,
            random: createRandomSource(search.seed),
            ...options
        });
    }

    /**
     * Chooses a move for the AI player on `grid`, which is left unchanged.
     * Returns null when there is no move: invalid AI player, unsupported grid, or a full board.
     */
    public findBestMove(grid: ReadonlyGrid): SearchResult | null {
        if (this.timeLimitMs !== null) {
            return this.findBestMoveWithinTime(grid, this.timeLimitMs);
        }
        return this.runSearch(grid, null);
    }

    /**
     * Iterative deepening from depth 1 up to the configured depth. The clock is only
     * read between whole iterations; the best result of the last finished depth wins.
     */
    public findBestMoveWithinTime(grid: ReadonlyGrid, timeLimitMs: number): SearchResult | null {
        return this.runSearch(grid, timeLimitMs);
    }

    /**
     * Scores every candidate with a search of at most four plies, best first
     */
    public getTopMoves(grid: ReadonlyGrid, count = 5): SearchResult[] {
        this.stats = emptyStats();
        const started = this.now();
        const ctx = this.createContext(grid);
        if (!ctx || ctx.board.isFull()) {
            return [];
        }

        ctx.rootDepth = Math.min(this.maxDepth, MAX_TOP_MOVES_DEPTH);
        const scored = this.generateCandidates(ctx).map(move => ({
            row: move.row,
            col: move.col,
            score: this.searchChild(ctx, move, ctx.ai, ctx.rootDepth - 1, false, -Infinity, Infinity)
        }));
        scored.sort((a, b) => b.score - a.score);

        this.stats.elapsedMs = this.now() - started;
        return scored.slice(0, Math.max(0, count));
    }

    public setDifficulty(level: Difficulty): void {
        this.difficulty = level;
        this.maxDepth = level;
        this.maxCandidates = MAX_CANDIDATES[level];
    }

    public setPlayStyle(style: PlayStyle): void {
        this.playStyle = style;
    }

    public setTimeLimit(timeLimitMs: number | null): void {
        this.timeLimitMs = timeLimitMs;
    }

    public setAIPlayer(player: number): void {
        this.aiPlayer = player;
    }

    public getDifficulty(): Difficulty {
        return this.difficulty;
    }

    public getPlayStyle(): PlayStyle {
        return this.playStyle;
    }

    public getTimeLimit(): number | null {
        return this.timeLimitMs;
    }

    public getMaxDepth(): number {
        return this.maxDepth;
    }

    public getMaxCandidates(): number {
        return this.maxCandidates;
    }

    public getAIPlayer(): number {
        return this.aiPlayer;
    }

    /**
     * The AI's opponent, or null while the AI player id is invalid
     */
    public getOpponentPlayer(): Player | null {
        return isPlayer(this.aiPlayer) ? opponentOf(this.aiPlayer) : null;
    }

    public getLastThinkingStats(): ThinkingStats {
        return { ...this.stats };
    }

    private runSearch(grid: ReadonlyGrid, timeLimitMs: number | null): SearchResult | null {
        this.stats = emptyStats();
        const started = this.now();

        const ctx = this.createContext(grid);
        if (!ctx || ctx.board.isFull()) {
            return null;
        }

        const result = this.chooseMove(ctx, started, timeLimitMs);
        this.stats.elapsedMs = this.now() - started;

        log.debug('Search finished', {
            ai: ctx.ai,
            move: result,
            difficulty: this.difficulty,
            playStyle: this.playStyle,
            ...this.stats
        });
        return result;
    }

    private createContext(grid: ReadonlyGrid): SearchContext | null {
        if (!isPlayer(this.aiPlayer)) {
            log.warn('Search requested for an invalid AI player', { aiPlayer: this.aiPlayer });
            return null;
        }

        const board = Board.fromGrid(grid);
        if (!board) {
            log.warn('Search requested on an unsupported grid', { rows: grid.length });
            return null;
        }

        return { board, ai: this.aiPlayer, opponent: opponentOf(this.aiPlayer), rootDepth: this.maxDepth };
    }

    private chooseMove(ctx: SearchContext, started: number, timeLimitMs: number | null): SearchResult | null {
        const { board } = ctx;

        if (board.isEmpty()) {
            const center = board.getBoardCenter();
            return { row: center.row, col: center.col, score: OPENING_SCORE };
        }

        const forced = this.findForcedMove(ctx);
        if (forced) {
            return forced;
        }

        const candidates = this.generateCandidates(ctx);
        if (candidates.length === 0) {
            const fallback = pickRandom(board.getEmptyCells(), this.random);
            return fallback ? { row: fallback.row, col: fallback.col, score: 0 } : null;
        }

        if (timeLimitMs === null) {
            ctx.rootDepth = this.maxDepth;
            return this.searchRoot(ctx, candidates);
        }

        let best: SearchResult | null = null;
        for (let depth = 1; depth <= this.maxDepth; depth++) {
            ctx.rootDepth = depth;
            best = this.searchRoot(ctx, candidates);
            this.stats.completedDepth = depth;

            const elapsed = this.now() - started;
            if (elapsed >= timeLimitMs && depth < this.maxDepth) {
                log.debug('Time limit reached, stopping deepening', { depth, elapsed, timeLimitMs });
                break;
            }
        }
        return best;
    }

    /**
     * An immediate win for the AI, otherwise a cell the opponent would win on next move
     */
    private findForcedMove(ctx: SearchContext): SearchResult | null {
        const grid = ctx.board.getGrid();
        // Five can only be completed next to an existing stone, which always lies in an active tile
        const cells = ctx.board.getEmptyCellsInActiveRegions();

        const win = cells.find(({ row, col }) => RuleEngine.isWinningThreat(grid, row, col, ctx.ai));
        if (win) {
            return { row: win.row, col: win.col, score: WIN_MOVE_SCORE };
        }

        const block = cells.find(({ row, col }) => RuleEngine.isBlockingThreat(grid, row, col, ctx.ai));
        if (block) {
            return { row: block.row, col: block.col, score: BLOCK_MOVE_SCORE };
        }

        return null;
    }

    private searchRoot(ctx: SearchContext, candidates: Position[]): SearchResult {
        let best: SearchResult = { row: candidates[0].row, col: candidates[0].col, score: -Infinity };
        let alpha = -Infinity;

        for (const move of candidates) {
            const score = this.searchChild(ctx, move, ctx.ai, ctx.rootDepth - 1, false, alpha, Infinity);
            // Strictly greater: ties keep the earlier candidate
            if (score > best.score) {
                best = { row: move.row, col: move.col, score };
            }
            alpha = Math.max(alpha, score);
        }

        return best;
    }

    /**
     * Plays `move` for `player`, searches the resulting position and takes the move back.
     * A rejected move leaves the board alone and scores the current position.
     */
    private searchChild(
        ctx: SearchContext,
        move: Position,
        player: Player,
        depth: number,
        maximizing: boolean,
        alpha: number,
        beta: number
    ): number {
        const score = ctx.board.tryMove(move.row, move.col, player, () =>
            this.minimax(ctx, depth, maximizing, alpha, beta, move)
        );
        return score ?? this.evaluate(ctx);
    }

    private minimax(
        ctx: SearchContext,
        depth: number,
        maximizing: boolean,
        alpha: number,
        beta: number,
        lastMove: Position
    ): number {
        this.stats.nodesVisited++;
        this.stats.maxDepthReached = Math.max(this.stats.maxDepthReached, ctx.rootDepth - depth);

        const grid = ctx.board.getGrid();
        const mover = grid[lastMove.row][lastMove.col];
        if (RuleEngine.checkWinAtPosition(grid, lastMove.row, lastMove.col, mover)) {
            // Sooner wins and later losses score better
            return mover === ctx.ai ? TERMINAL_SCORE + depth : -(TERMINAL_SCORE + depth);
        }

        if (depth <= 0) {
            return this.evaluate(ctx);
        }

        const moves = this.generateCandidates(ctx);
        if (moves.length === 0) {
            return this.evaluate(ctx);
        }

        const player = maximizing ? ctx.ai : ctx.opponent;
        let best = maximizing ? -Infinity : Infinity;

        for (const move of moves) {
            const score = this.searchChild(ctx, move, player, depth - 1, !maximizing, alpha, beta);

            if (maximizing) {
                best = Math.max(best, score);
                alpha = Math.max(alpha, score);
            } else {
                best = Math.min(best, score);
                beta = Math.min(beta, score);
            }

            if (this.alphaBeta && beta <= alpha) {
                this.stats.prunes++;
                break;
            }
        }

        return best;
    }

    /**
     * Critical cells (a win for either side) first, then the best-looking cells near stones,
     * capped at `maxCandidates` and ordered by the single-ply heuristic, best first
     */
    private generateCandidates(ctx: SearchContext): Position[] {
        const grid = ctx.board.getGrid();
        const scored = this.nearbyEmptyCells(ctx.board).map(cell => ({
            cell,
            critical:
                RuleEngine.isWinningThreat(grid, cell.row, cell.col, ctx.ai) ||
                RuleEngine.isWinningThreat(grid, cell.row, cell.col, ctx.opponent),
            score: this.quickEvaluate(ctx, cell)
        }));

        const critical = scored.filter(entry => entry.critical);
        const quiet = scored.filter(entry => !entry.critical).sort((a, b) => b.score - a.score);

        return [...critical, ...quiet]
            .slice(0, this.maxCandidates)
            .sort((a, b) => b.score - a.score)
            .map(entry => entry.cell);
    }

    /**
     * Attack plus defence value of a cell, from the AI's and the opponent's patterns
     */
    private quickEvaluate(ctx: SearchContext, cell: Position): number {
        const grid = ctx.board.getGrid();
        return (
            RuleEngine.evaluatePosition(grid, cell.row, cell.col, ctx.ai) +
            RuleEngine.evaluatePosition(grid, cell.row, cell.col, ctx.opponent)
        );
    }

    /**
     * Empty cells within SEARCH_RADIUS of any stone, deduplicated, in row-major order of the stones
     */
    private nearbyEmptyCells(board: Board): Position[] {
        const size = board.getSize();
        const seen = new Set<number>();
        const cells: Position[] = [];

        const stones = board.getOccupiedCells().sort((a, b) => a.row - b.row || a.col - b.col);
        for (const stone of stones) {
            for (const cell of board.getNeighborCells(stone.row, stone.col, SEARCH_RADIUS)) {
                const key = cell.row * size + cell.col;
                if (!seen.has(key)) {
                    seen.add(key);
                    cells.push(cell);
                }
            }
        }
        return cells;
    }

    /**
     * Static value of the position from the AI's point of view
     */
    private evaluate(ctx: SearchContext): number {
        const grid = ctx.board.getGrid();
        let aiScore = 0;
        let opponentScore = 0;
        for (const { row, col } of this.nearbyEmptyCells(ctx.board)) {
            aiScore += RuleEngine.evaluatePosition(grid, row, col, ctx.ai);
            opponentScore += RuleEngine.evaluatePosition(grid, row, col, ctx.opponent);
        }

        const base = aiScore - opponentScore;
        switch (this.playStyle) {
            case PlayStyle.AGGRESSIVE:
                return base + Math.trunc(this.stonePatternScore(ctx, ctx.ai) / 2);
            case PlayStyle.DEFENSIVE:
                return base - Math.trunc(this.stonePatternScore(ctx, ctx.opponent) / 2);
            case PlayStyle.POSITIONAL:
                return base + this.centerControl(ctx);
            case PlayStyle.BALANCED:
            default:
                return base;
        }
    }

    /**
     * Pattern value of the stones `player` already has on the board
     */
    private stonePatternScore(ctx: SearchContext, player: Player): number {
        const grid = ctx.board.getGrid();
        let score = 0;
        for (const { row, col } of ctx.board.getOccupiedCells()) {
            if (grid[row][col] === player) {
                score += RuleEngine.evaluatePosition(grid, row, col, player);
            }
        }
        return score;
    }

    /**
     * Bonus for AI stones near the centre: 10 points per step closer than Manhattan distance 4
     */
    private centerControl(ctx: SearchContext): number {
        const { board, ai } = ctx;
        const center = board.getBoardCenter();
        let score = 0;

        for (let dr = -CENTER_RADIUS; dr <= CENTER_RADIUS; dr++) {
            for (let dc = -CENTER_RADIUS; dc <= CENTER_RADIUS; dc++) {
                if (board.getCell(center.row + dr, center.col + dc) === ai) {
                    score += Math.max(0, CENTER_RADIUS + 1 - Math.abs(dr) - Math.abs(dc)) * 10;
                }
            }
        }
        return score;
    }
}

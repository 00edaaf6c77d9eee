import { Board } from '../core/Board';
import { Player, Position } from '../core/types';
import { NoMoveError } from '../errors/EngineErrors';
import { RandomSource, createRandomSource, pickRandom } from './random';
import { SearchEngine, SearchResult, ThinkingStats } from './SearchEngine';

/**
 * Interface for computer players
 * Implement this interface to plug a different strategy into `Game.playAIMove`
 */
export interface AIPlayer {
    /**
     * Gets the next move for the AI player
     * @param board - The current game board, left unchanged
     * @param player - The side the AI is playing
     * @returns A promise that resolves to the chosen position, or rejects with `NoMoveError`
     */
    getMove(board: Board, player: Player): Promise<Position>;
}

/**
 * Plays a uniformly random empty cell
 */
export class RandomAIPlayer implements AIPlayer {
    private readonly random: RandomSource;

    constructor(random: RandomSource = createRandomSource()) {
        this.random = random;
    }

    public async getMove(board: Board, player: Player): Promise<Position> {
        const move = pickRandom(board.getEmptyCells(), this.random);
        if (!move) {
            throw new NoMoveError({ player, size: board.getSize() });
        }
        return move;
    }
}

/**
 * Plays the move chosen by a `SearchEngine`
 */
export class MinimaxAIPlayer implements AIPlayer {
    private readonly engine: SearchEngine;
    private lastResult: SearchResult | null = null;

    constructor(engine: SearchEngine = new SearchEngine()) {
        this.engine = engine;
    }

    public getEngine(): SearchEngine {
        return this.engine;
    }

    /**
     * Searches for `player`; the engine's own AI player is restored afterwards
     */
    public async getMove(board: Board, player: Player): Promise<Position> {
        const previous = this.engine.getAIPlayer();
        this.engine.setAIPlayer(player);
        let result: SearchResult | null = null;
        try {
            result = this.engine.findBestMove(board.getGrid());
        } finally {
            this.engine.setAIPlayer(previous);
        }
        this.lastResult = result;

        if (!result) {
            throw new NoMoveError({ player, size: board.getSize() });
        }
        return { row: result.row, col: result.col };
    }

    /**
     * Score of the last move returned, for display
     */
    public getLastResult(): SearchResult | null {
        return this.lastResult;
    }

    public getThinkingStats(): ThinkingStats {
        return this.engine.getLastThinkingStats();
    }
}

import { describe, it, expect, beforeEach } from 'vitest';
import { MinimaxAIPlayer, RandomAIPlayer } from './AIPlayer';
import { SearchEngine, WIN_MOVE_SCORE } from './SearchEngine';
import { createSeededRandom } from './random';
import { Board } from '../core/Board';
import { Cell } from '../core/types';
import { NoMoveError } from '../errors/EngineErrors';
import { drawPatternGrid, gridWith, line } from '../testing/grids';

function fullBoard(): Board {
    const board = Board.fromGrid(drawPatternGrid());
    if (!board) {
        throw new Error('draw pattern should load');
    }
    return board;
}

describe('RandomAIPlayer', () => {
    let ai: RandomAIPlayer;
    let board: Board;

    beforeEach(() => {
        ai = new RandomAIPlayer(createSeededRandom(1));
        board = new Board();
    });

    describe('getMove', () => {
        it('returns an empty position', async () => {
            board.makeMove(7, 7, Cell.PLAYER_ONE);
            board.makeMove(7, 8, Cell.PLAYER_TWO);

            const move = await ai.getMove(board, Cell.PLAYER_ONE);
            expect(board.isValidMove(move.row, move.col)).toBe(true);
        });

        it('is reproducible for a given seed', async () => {
            const other = new RandomAIPlayer(createSeededRandom(1));
            expect(await ai.getMove(board, Cell.PLAYER_TWO)).toEqual(await other.getMove(board, Cell.PLAYER_TWO));
        });

        it('throws when no moves available', async () => {
            await expect(ai.getMove(fullBoard(), Cell.PLAYER_ONE)).rejects.toThrow('No available moves');
            await expect(ai.getMove(fullBoard(), Cell.PLAYER_ONE)).rejects.toBeInstanceOf(NoMoveError);
        });

        it('can find the only remaining move', async () => {
            const grid = drawPatternGrid();
            grid[14][14] = Cell.EMPTY;
            const almostFull = Board.fromGrid(grid);

            expect(almostFull).not.toBeNull();
            if (almostFull) {
                expect(await ai.getMove(almostFull, Cell.PLAYER_TWO)).toEqual({ row: 14, col: 14 });
            }
        });
    });
});

describe('MinimaxAIPlayer', () => {
    it('opens in the centre', async () => {
        const ai = new MinimaxAIPlayer();
        expect(await ai.getMove(new Board(), Cell.PLAYER_ONE)).toEqual({ row: 7, col: 7 });
    });

    it('searches for the side it is asked to play', async () => {
        const ai = new MinimaxAIPlayer(new SearchEngine({ maxDepth: 2 }));
        const board = Board.fromGrid(gridWith([[7, 2, Cell.PLAYER_TWO], ...line(7, 3, 0, 1, 4, Cell.PLAYER_ONE)]));

        expect(board).not.toBeNull();
        if (board) {
            const before = board.toGrid();
            const move = await ai.getMove(board, Cell.PLAYER_ONE);

            expect(move).toEqual({ row: 7, col: 7 });
            expect(ai.getEngine().getAIPlayer()).toBe(Cell.PLAYER_TWO);
            expect(ai.getLastResult()).toEqual({ row: 7, col: 7, score: WIN_MOVE_SCORE });
            expect(ai.getThinkingStats().nodesVisited).toBe(0);
            expect(board.toGrid()).toEqual(before);
        }
    });

    it('leaves a shared engine playing its own side', async () => {
        const engine = new SearchEngine({ aiPlayer: Cell.PLAYER_TWO });
        const ai = new MinimaxAIPlayer(engine);

        await ai.getMove(new Board(), Cell.PLAYER_ONE);
        expect(engine.getAIPlayer()).toBe(Cell.PLAYER_TWO);

        await expect(ai.getMove(fullBoard(), Cell.PLAYER_ONE)).rejects.toBeInstanceOf(NoMoveError);
        expect(engine.getAIPlayer()).toBe(Cell.PLAYER_TWO);
    });

    it('throws when no moves available', async () => {
        const ai = new MinimaxAIPlayer();

        await expect(ai.getMove(fullBoard(), Cell.PLAYER_TWO)).rejects.toBeInstanceOf(NoMoveError);
        expect(ai.getLastResult()).toBeNull();
    });
});

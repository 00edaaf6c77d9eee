import { describe, it, expect, beforeEach } from 'vitest';
import { Game } from './Game';
import { Cell, GameState, MoveResult, Position } from './types';
import type { AIPlayer } from '../ai/AIPlayer';
import { RandomAIPlayer } from '../ai/AIPlayer';
import { createSeededRandom } from '../ai/random';
import { EngineErrorCode } from '../errors/EngineErrors';
import { drawPatternOwner } from '../testing/grids';

function playAll(game: Game, moves: Position[]): boolean[] {
    return moves.map(move => game.makeMove(move));
}

// Player one on row 7, player two on row 0; player one completes five on the ninth move
const HORIZONTAL_WIN: Position[] = [
    { row: 7, col: 0 }, { row: 0, col: 0 },
    { row: 7, col: 1 }, { row: 0, col: 1 },
    { row: 7, col: 2 }, { row: 0, col: 2 },
    { row: 7, col: 3 }, { row: 0, col: 3 },
    { row: 7, col: 4 }
];

describe('Game', () => {
    let game: Game;

    beforeEach(() => {
        game = new Game();
    });

    describe('constructor', () => {
        it('starts with player one to move', () => {
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_ONE);
        });

        it('starts in PLAYING state', () => {
            expect(game.getGameState()).toBe(GameState.PLAYING);
            expect(game.getWinner()).toBeNull();
        });

        it('starts with empty move history', () => {
            expect(game.getMoveHistory()).toEqual([]);
        });

        it('uses the configured board size', () => {
            expect(game.getBoard().getSize()).toBe(15);
            expect(new Game(30).getBoard().getSize()).toBe(30);
        });
    });

    describe('makeMove', () => {
        it('places the current player stone and passes the turn', () => {
            expect(game.makeMove({ row: 7, col: 7 })).toBe(true);
            expect(game.getBoard().getCell(7, 7)).toBe(Cell.PLAYER_ONE);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_TWO);
            expect(game.getMoveHistory()).toEqual([{ row: 7, col: 7, player: Cell.PLAYER_ONE }]);
        });

        it('rejects occupied and out-of-bounds cells without passing the turn', () => {
            game.makeMove({ row: 7, col: 7 });

            expect(game.validateMove({ row: 7, col: 7 })).toBe(MoveResult.CELL_OCCUPIED);
            expect(game.validateMove({ row: 15, col: 0 })).toBe(MoveResult.OUT_OF_BOUNDS);
            expect(game.makeMove({ row: 7, col: 7 })).toBe(false);
            expect(game.makeMove({ row: -1, col: 3 })).toBe(false);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_TWO);
        });

        it('detects a horizontal win', () => {
            const results = playAll(game, HORIZONTAL_WIN);

            expect(results.every(Boolean)).toBe(true);
            expect(game.getGameState()).toBe(GameState.PLAYER1_WIN);
            expect(game.getWinner()).toBe(Cell.PLAYER_ONE);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_ONE);
        });

        it('refuses moves after the game is over', () => {
            playAll(game, HORIZONTAL_WIN);

            expect(game.makeMove({ row: 10, col: 10 })).toBe(false);
            expect(game.isValidMove({ row: 10, col: 10 })).toBe(false);
            expect(game.getMoveHistory()).toHaveLength(9);
        });

        it('detects a draw on a full board', () => {
            const ones: Position[] = [];
            const twos: Position[] = [];
            for (let row = 0; row < 15; row++) {
                for (let col = 0; col < 15; col++) {
                    (drawPatternOwner(row, col) === Cell.PLAYER_ONE ? ones : twos).push({ row, col });
                }
            }
            const moves: Position[] = [];
            ones.forEach((move, i) => {
                moves.push(move);
                if (i < twos.length) {
                    moves.push(twos[i]);
                }
            });

            const results = playAll(game, moves);

            expect(moves).toHaveLength(225);
            expect(results.every(Boolean)).toBe(true);
            expect(game.getGameState()).toBe(GameState.DRAW);
            expect(game.getWinner()).toBeNull();
        });
    });

    describe('undoMove', () => {
        it('returns false with nothing to undo', () => {
            expect(game.undoMove()).toBe(false);
        });

        it('gives the turn back to the player who moved', () => {
            game.makeMove({ row: 7, col: 7 });
            game.makeMove({ row: 7, col: 8 });

            expect(game.undoMove()).toBe(true);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_TWO);
            expect(game.getBoard().getCell(7, 8)).toBe(Cell.EMPTY);
        });

        it('reopens a finished game', () => {
            playAll(game, HORIZONTAL_WIN);

            expect(game.undoMove()).toBe(true);
            expect(game.getGameState()).toBe(GameState.PLAYING);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_ONE);
            expect(game.getMoveHistory()).toHaveLength(8);
            expect(game.makeMove({ row: 7, col: 4 })).toBe(true);
            expect(game.getGameState()).toBe(GameState.PLAYER1_WIN);
        });
    });

    describe('reset and resize', () => {
        it('resets to an empty board with player one to move', () => {
            game.makeMove({ row: 7, col: 7 });
            expect(game.reset(25)).toBe(true);

            expect(game.getBoard().getSize()).toBe(25);
            expect(game.getBoard().isEmpty()).toBe(true);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_ONE);
            expect(game.getGameState()).toBe(GameState.PLAYING);
        });

        it('keeps a finished game as it was when the new size is invalid', () => {
            playAll(game, HORIZONTAL_WIN);

            expect(game.reset(5)).toBe(false);
            expect(game.getMoveHistory()).toHaveLength(9);
            expect(game.getGameState()).toBe(GameState.PLAYER1_WIN);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_ONE);
            expect(game.getBoard().getSize()).toBe(15);
            expect(game.makeMove({ row: 0, col: 14 })).toBe(false);
        });

        it('resizes only before the first move', () => {
            expect(game.resize(20)).toBe(true);
            expect(game.getBoard().getSize()).toBe(20);

            game.makeMove({ row: 0, col: 0 });
            expect(game.resize(30)).toBe(false);
            expect(game.getBoard().getSize()).toBe(20);
        });

        it('rejects invalid sizes', () => {
            expect(game.resize(8)).toBe(false);
            expect(game.getBoard().getSize()).toBe(15);
        });
    });

    describe('playAIMove', () => {
        it('plays the move chosen by the AI', async () => {
            const position = await game.playAIMove(new RandomAIPlayer(createSeededRandom(3)));

            expect(game.getBoard().getCell(position.row, position.col)).toBe(Cell.PLAYER_ONE);
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_TWO);
        });

        it('rejects when the game is over', async () => {
            playAll(game, HORIZONTAL_WIN);

            await expect(game.playAIMove(new RandomAIPlayer(createSeededRandom(3)))).rejects.toMatchObject({
                code: EngineErrorCode.GAME_NOT_ACTIVE
            });
        });

        it('rejects an illegal AI move', async () => {
            const stubborn: AIPlayer = { getMove: async () => ({ row: 7, col: 7 }) };
            game.makeMove({ row: 7, col: 7 });

            await expect(game.playAIMove(stubborn)).rejects.toMatchObject({
                code: EngineErrorCode.MOVE_REJECTED,
                context: { row: 7, col: 7 }
            });
            expect(game.getCurrentPlayer()).toBe(Cell.PLAYER_TWO);
        });
    });
});

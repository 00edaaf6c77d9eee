import type { AIPlayer } from '../ai/AIPlayer';
import { config } from '../config';
import { EngineError, EngineErrorCode } from '../errors/EngineErrors';
import { getLogger } from '../utils/logger';
import { Board } from './Board';
import { RuleEngine } from './RuleEngine';
import { Cell, GameState, Move, MoveResult, Player, Position, opponentOf } from './types';

const log = getLogger('Game');

/**
 * A two-player game session: whose turn it is and whether the game is over.
 *
 * The board does the bookkeeping and `RuleEngine` decides the outcome; the
 * state is re-evaluated after every move and undo.
 */
export class Game {
    private board: Board;
    private currentPlayer: Player;
    private gameState: GameState;

    constructor(size: number = config.boardSize) {
        this.board = new Board(size);
        this.currentPlayer = Cell.PLAYER_ONE; // Player one moves first
        this.gameState = GameState.PLAYING;
    }

    /**
     * Gets the current board
     */
    public getBoard(): Board {
        return this.board;
    }

    /**
     * Gets the player to move
     */
    public getCurrentPlayer(): Player {
        return this.currentPlayer;
    }

    /**
     * Gets the current game state
     */
    public getGameState(): GameState {
        return this.gameState;
    }

    /**
     * Gets the move history
     */
    public getMoveHistory(): Move[] {
        return [...this.board.getMoveHistory()];
    }

    /**
     * Checks a move for the current player without playing it
     */
    public validateMove(position: Position): MoveResult {
        return RuleEngine.validateMove(this.board.getGrid(), position.row, position.col, this.currentPlayer);
    }

    /**
     * Plays the current player's stone at `position`.
     * Returns false when the game is over or the move is illegal.
     */
    public makeMove(position: Position): boolean {
        if (this.gameState !== GameState.PLAYING) {
            return false;
        }

        const result = this.validateMove(position);
        if (result !== MoveResult.VALID) {
            log.debug('Move rejected', { ...position, player: this.currentPlayer, result });
            return false;
        }

        this.board.makeMove(position.row, position.col, this.currentPlayer);
        this.gameState = RuleEngine.checkGameState(this.board.getGrid(), position.row, position.col);

        if (this.gameState !== GameState.PLAYING) {
            log.info('Game over', {
                result: RuleEngine.gameStateToString(this.gameState),
                moves: this.board.getMoveCount()
            });
            return true;
        }

        this.switchPlayer();
        return true;
    }

    /**
     * Asks `ai` for a move for the current player and plays it
     */
    public async playAIMove(ai: AIPlayer): Promise<Position> {
        if (this.gameState !== GameState.PLAYING) {
            throw new EngineError(EngineErrorCode.GAME_NOT_ACTIVE, 'Game is already over', {
                state: this.gameState
            });
        }

        const position = await ai.getMove(this.board, this.currentPlayer);
        if (!this.makeMove(position)) {
            throw new EngineError(EngineErrorCode.MOVE_REJECTED, 'AI chose an illegal move', { ...position });
        }
        return position;
    }

    /**
     * Takes back the last move, reopening a finished game
     */
    public undoMove(): boolean {
        const last = this.board.getLastMove();
        if (!last || !this.board.undoLastMove()) {
            return false;
        }

        this.currentPlayer = last.player;
        const previous = this.board.getLastMove();
        this.gameState = previous
            ? RuleEngine.checkGameState(this.board.getGrid(), previous.row, previous.col)
            : GameState.PLAYING;
        return true;
    }

    /**
     * Switches the current player
     */
    private switchPlayer(): void {
        this.currentPlayer = opponentOf(this.currentPlayer);
    }

    /**
     * Resets the game to initial state, optionally on a board of a new size.
     * An invalid size leaves the game as it was and returns false.
     */
    public reset(size?: number): boolean {
        if (!this.board.reset(size)) {
            return false;
        }
        this.currentPlayer = Cell.PLAYER_ONE;
        this.gameState = GameState.PLAYING;
        return true;
    }

    /**
     * Changes the board size; only allowed before the first move
     */
    public resize(size: number): boolean {
        if (!this.board.isEmpty()) {
            return false;
        }
        return this.board.resize(size);
    }

    /**
     * Checks if a move is valid for the current player
     */
    public isValidMove(position: Position): boolean {
        return this.gameState === GameState.PLAYING && this.validateMove(position) === MoveResult.VALID;
    }

    /**
     * Gets the winner (if any)
     */
    public getWinner(): Player | null {
        if (this.gameState === GameState.PLAYER1_WIN) {
            return Cell.PLAYER_ONE;
        }
        if (this.gameState === GameState.PLAYER2_WIN) {
            return Cell.PLAYER_TWO;
        }
        return null;
    }
}

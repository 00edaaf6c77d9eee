import { getLogger } from '../utils/logger';
import { Cell, Grid, Move, OUT_OF_BOUNDS, Position, ReadonlyGrid, isPlayer } from './types';

const log = getLogger('Board');

/** Multiplier that packs a tile row into the upper 32 bits of a region key */
const REGION_ROW_SHIFT = 2 ** 32;

export interface BoardBounds {
    min: Position;
    max: Position;
}

/**
 * Represents the game board: the grid plus the indices the search relies on.
 *
 * Cells only change through `makeMove` and `undoLastMove` (and the bulk
 * operations built on them), which keeps `moveCount`, the move history, the
 * occupied-cell cache and the active-region index in step with the grid.
 * The board knows nothing about winning; see `RuleEngine`.
 */
export class Board {
    public static readonly MIN_SIZE = 15;
    public static readonly MAX_SIZE = 100;
    public static readonly DEFAULT_SIZE = 15;
    public static readonly REGION_SIZE = 10;

    private size: number;
    private grid: Grid;
    private moveCount = 0;
    private moveHistory: Move[] = [];
    // Keyed by row * MAX_SIZE + col so keys survive a resize
    private occupiedCells = new Map<number, Position>();
    private activeRegions = new Set<number>();
    private lastMove: Move | null = null;

    constructor(size: number = Board.DEFAULT_SIZE) {
        if (!Board.isValidSize(size)) {
            log.warn('Invalid board size, using default', { requested: size, size: Board.DEFAULT_SIZE });
            size = Board.DEFAULT_SIZE;
        }

        let grid: Grid;
        try {
            grid = Board.createEmptyGrid(size);
        } catch (error) {
            log.error('Board allocation failed, using default size', { requested: size, error });
            size = Board.DEFAULT_SIZE;
            grid = Board.createEmptyGrid(size);
        }

        this.size = size;
        this.grid = grid;
    }

    /**
     * Builds a board holding the stones of `grid`, placed in row-major order.
     * Returns null when the grid is not square, has an unsupported size or holds an unknown value.
     */
    public static fromGrid(grid: ReadonlyGrid): Board | null {
        const size = grid.length;
        if (!Board.isValidSize(size) || grid.some(row => row.length !== size)) {
            return null;
        }

        const board = new Board(size);
        for (let row = 0; row < size; row++) {
            for (let col = 0; col < size; col++) {
                const cell = grid[row][col];
                if (cell === Cell.EMPTY) {
                    continue;
                }
                if (!board.makeMove(row, col, cell)) {
                    return null;
                }
            }
        }
        return board;
    }

    public static isValidSize(size: number): boolean {
        return Number.isInteger(size) && size >= Board.MIN_SIZE && size <= Board.MAX_SIZE;
    }

    /**
     * Packs the 10x10 tile containing (row, col) into one integer: `(row / 10) << 32 | (col / 10)`
     */
    public static regionKey(row: number, col: number): number {
        return Board.tileKey(Math.floor(row / Board.REGION_SIZE), Math.floor(col / Board.REGION_SIZE));
    }

    public static decodeRegionKey(key: number): { regionRow: number; regionCol: number } {
        return {
            regionRow: Math.floor(key / REGION_ROW_SHIFT),
            regionCol: key % REGION_ROW_SHIFT
        };
    }

    private static tileKey(regionRow: number, regionCol: number): number {
        return regionRow * REGION_ROW_SHIFT + regionCol;
    }

    private static createEmptyGrid(size: number): Grid {
        return Array.from({ length: size }, () => new Array<Cell>(size).fill(Cell.EMPTY));
    }

    private static cellKey(row: number, col: number): number {
        return row * Board.MAX_SIZE + col;
    }

    /**
     * Gets the size of the board
     */
    public getSize(): number {
        return this.size;
    }

    /**
     * Gets the value at (row, col), or OUT_OF_BOUNDS
     */
    public getCell(row: number, col: number): Cell | typeof OUT_OF_BOUNDS {
        if (!this.isInBounds(row, col)) {
            return OUT_OF_BOUNDS;
        }
        return this.grid[row][col];
    }

    /**
     * Read-only view of the live grid
     */
    public getGrid(): ReadonlyGrid {
        return this.grid;
    }

    /**
     * Gets a copy of the current grid
     */
    public toGrid(): Grid {
        return this.grid.map(row => [...row]);
    }

    public getMoveCount(): number {
        return this.moveCount;
    }

    public getMoveHistory(): readonly Move[] {
        return this.moveHistory;
    }

    public getLastMove(): Move | null {
        return this.lastMove;
    }

    public getOccupiedCells(): Position[] {
        return [...this.occupiedCells.values()];
    }

    public getActiveRegions(): number[] {
        return [...this.activeRegions];
    }

    public isInBounds(row: number, col: number): boolean {
        return (
            Number.isInteger(row) &&
            Number.isInteger(col) &&
            row >= 0 &&
            row < this.size &&
            col >= 0 &&
            col < this.size
        );
    }

    public isValidMove(row: number, col: number): boolean {
        return this.isInBounds(row, col) && this.grid[row][col] === Cell.EMPTY;
    }

    /**
     * Places a stone for `player`. Returns false without touching the board when the move is illegal.
     */
    public makeMove(row: number, col: number, player: number): boolean {
        if (!isPlayer(player) || !this.isValidMove(row, col)) {
            return false;
        }

        this.grid[row][col] = player;
        this.moveCount++;

        const move: Move = { row, col, player };
        this.moveHistory.push(move);
        this.lastMove = move;

        this.occupiedCells.set(Board.cellKey(row, col), { row, col });
        Board.addActiveRegion(this.size, row, col, this.activeRegions);

        return true;
    }

    /**
     * Reverts the most recent move
     */
    public undoLastMove(): boolean {
        const move = this.moveHistory.pop();
        if (!move) {
            return false;
        }

        this.grid[move.row][move.col] = Cell.EMPTY;
        this.moveCount--;
        this.occupiedCells.delete(Board.cellKey(move.row, move.col));
        this.lastMove = this.moveHistory[this.moveHistory.length - 1] ?? null;

        // A tile may only stay active while some remaining stone still maps to it
        this.activeRegions = Board.buildActiveRegions(this.size, this.occupiedCells.values());
        return true;
    }

    /**
     * Plays a trial stone, runs `fn` on the resulting position and takes the stone back.
     * Returns null, without running `fn`, when the move is rejected.
     */
    public tryMove<T>(row: number, col: number, player: number, fn: () => T): T | null {
        if (!this.makeMove(row, col, player)) {
            return null;
        }
        try {
            return fn();
        } finally {
            this.undoLastMove();
        }
    }

    /**
     * Reverts the last `count` moves; stops and returns false when history runs out
     */
    public undoMoves(count: number): boolean {
        for (let i = 0; i < count; i++) {
            if (!this.undoLastMove()) {
                return false;
            }
        }
        return true;
    }

    /**
     * Changes the board size, keeping the stones of the overlapping top-left area.
     * Everything is rebuilt into temporaries first so a failure leaves the board as it was.
     */
    public resize(newSize: number): boolean {
        if (!Board.isValidSize(newSize)) {
            return false;
        }

        try {
            const grid = Board.createEmptyGrid(newSize);
            const copySize = Math.min(this.size, newSize);
            for (let row = 0; row < copySize; row++) {
                for (let col = 0; col < copySize; col++) {
                    grid[row][col] = this.grid[row][col];
                }
            }

            const inBounds = (cell: Position): boolean => cell.row < newSize && cell.col < newSize;
            const moveHistory = this.moveHistory.filter(inBounds);
            const occupiedCells = new Map(
                [...this.occupiedCells].filter(([, cell]) => inBounds(cell))
            );
            const activeRegions = Board.buildActiveRegions(newSize, occupiedCells.values());

            const previousSize = this.size;
            this.size = newSize;
            this.grid = grid;
            this.moveHistory = moveHistory;
            this.moveCount = moveHistory.length;
            this.occupiedCells = occupiedCells;
            this.lastMove = moveHistory[moveHistory.length - 1] ?? null;
            this.activeRegions = activeRegions;

            log.debug('Board resized', { from: previousSize, to: newSize, stones: this.moveCount });
            return true;
        } catch (error) {
            log.warn('Board resize failed', { from: this.size, to: newSize, error });
            return false;
        }
    }

    /**
     * Clears the board, optionally switching to a new size first.
     * An invalid new size leaves the board untouched and returns false.
     */
    public reset(newSize?: number): boolean {
        if (newSize !== undefined && !this.resize(newSize)) {
            return false;
        }

        for (const row of this.grid) {
            row.fill(Cell.EMPTY);
        }
        this.moveCount = 0;
        this.moveHistory = [];
        this.occupiedCells.clear();
        this.activeRegions.clear();
        this.lastMove = null;
        return true;
    }

    public isFull(): boolean {
        return this.moveCount >= this.size * this.size;
    }

    public isEmpty(): boolean {
        return this.moveCount === 0;
    }

    /**
     * All empty cells, row-major. Linear in the board area.
     */
    public getEmptyCells(): Position[] {
        return this.getEmptyCellsInRegion(0, 0, this.size, this.size);
    }

    /**
     * Empty cells in the half-open rectangle [startRow, endRow) x [startCol, endCol), clamped to the board
     */
    public getEmptyCellsInRegion(startRow: number, startCol: number, endRow: number, endCol: number): Position[] {
        const cells: Position[] = [];
        const rowFrom = Math.max(0, startRow);
        const colFrom = Math.max(0, startCol);
        const rowTo = Math.min(this.size, endRow);
        const colTo = Math.min(this.size, endCol);

        for (let row = rowFrom; row < rowTo; row++) {
            for (let col = colFrom; col < colTo; col++) {
                if (this.grid[row][col] === Cell.EMPTY) {
                    cells.push({ row, col });
                }
            }
        }
        return cells;
    }

    /**
     * Empty cells within Chebyshev distance `radius` of (row, col), excluding the origin
     */
    public getNeighborCells(row: number, col: number, radius = 2): Position[] {
        const neighbors: Position[] = [];
        const rowFrom = Math.max(0, row - radius);
        const rowTo = Math.min(this.size, row + radius + 1);
        const colFrom = Math.max(0, col - radius);
        const colTo = Math.min(this.size, col + radius + 1);

        for (let r = rowFrom; r < rowTo; r++) {
            for (let c = colFrom; c < colTo; c++) {
                if (this.grid[r][c] === Cell.EMPTY && (r !== row || c !== col)) {
                    neighbors.push({ row: r, col: c });
                }
            }
        }
        return neighbors;
    }

    /**
     * Occupied cells inside the tile identified by `regionKey`
     */
    public getCellsInRegion(regionKey: number): Position[] {
        const { regionRow, regionCol } = Board.decodeRegionKey(regionKey);
        const cells: Position[] = [];
        const rowFrom = regionRow * Board.REGION_SIZE;
        const colFrom = regionCol * Board.REGION_SIZE;
        const rowTo = Math.min(this.size, rowFrom + Board.REGION_SIZE);
        const colTo = Math.min(this.size, colFrom + Board.REGION_SIZE);

        for (let row = rowFrom; row < rowTo; row++) {
            for (let col = colFrom; col < colTo; col++) {
                if (this.grid[row][col] !== Cell.EMPTY) {
                    cells.push({ row, col });
                }
            }
        }
        return cells;
    }

    /**
     * Empty cells of every active tile, row-major. On an empty board this is empty.
     */
    public getEmptyCellsInActiveRegions(): Position[] {
        const cells: Position[] = [];
        for (const key of this.activeRegions) {
            const { regionRow, regionCol } = Board.decodeRegionKey(key);
            const rowFrom = regionRow * Board.REGION_SIZE;
            const colFrom = regionCol * Board.REGION_SIZE;
            cells.push(
                ...this.getEmptyCellsInRegion(rowFrom, colFrom, rowFrom + Board.REGION_SIZE, colFrom + Board.REGION_SIZE)
            );
        }
        return cells.sort((a, b) => a.row - b.row || a.col - b.col);
    }

    /**
     * Bounding box of all stones; the centre cell when the board is empty
     */
    public getActiveBounds(): BoardBounds {
        if (this.occupiedCells.size === 0) {
            const center = this.getBoardCenter();
            return { min: { ...center }, max: { ...center } };
        }

        let minRow = this.size;
        let minCol = this.size;
        let maxRow = -1;
        let maxCol = -1;
        for (const { row, col } of this.occupiedCells.values()) {
            minRow = Math.min(minRow, row);
            minCol = Math.min(minCol, col);
            maxRow = Math.max(maxRow, row);
            maxCol = Math.max(maxCol, col);
        }
        return { min: { row: minRow, col: minCol }, max: { row: maxRow, col: maxCol } };
    }

    public getBoardCenter(): Position {
        const center = Math.floor(this.size / 2);
        return { row: center, col: center };
    }

    /**
     * Fraction of cells holding a stone, 0..1
     */
    public getOccupancyRate(): number {
        return this.moveCount / (this.size * this.size);
    }

    /**
     * Checks that the counters, caches and region index agree with the grid
     */
    public validateState(): boolean {
        let stones = 0;
        for (let row = 0; row < this.size; row++) {
            for (let col = 0; col < this.size; col++) {
                if (this.grid[row][col] === Cell.EMPTY) {
                    continue;
                }
                stones++;
                if (!this.occupiedCells.has(Board.cellKey(row, col))) {
                    return false;
                }
            }
        }

        const expectedRegions = Board.buildActiveRegions(this.size, this.occupiedCells.values());
        const regionsMatch =
            expectedRegions.size === this.activeRegions.size &&
            [...expectedRegions].every(key => this.activeRegions.has(key));

        return (
            stones === this.moveCount &&
            this.occupiedCells.size === this.moveCount &&
            this.moveHistory.length === this.moveCount &&
            regionsMatch
        );
    }

    /**
     * Marks the tile of (row, col) and its eight neighbouring tiles as active
     */
    private static addActiveRegion(size: number, row: number, col: number, regions: Set<number>): void {
        const tiles = Math.ceil(size / Board.REGION_SIZE);
        const regionRow = Math.floor(row / Board.REGION_SIZE);
        const regionCol = Math.floor(col / Board.REGION_SIZE);

        for (let dr = -1; dr <= 1; dr++) {
            for (let dc = -1; dc <= 1; dc++) {
                const r = regionRow + dr;
                const c = regionCol + dc;
                if (r >= 0 && r < tiles && c >= 0 && c < tiles) {
                    regions.add(Board.tileKey(r, c));
                }
            }
        }
    }

    private static buildActiveRegions(size: number, cells: Iterable<Position>): Set<number> {
        const regions = new Set<number>();
        for (const { row, col } of cells) {
            Board.addActiveRegion(size, row, col, regions);
        }
        return regions;
    }
}

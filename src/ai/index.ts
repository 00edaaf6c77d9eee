export type { AIPlayer } from './AIPlayer';
export { RandomAIPlayer, MinimaxAIPlayer } from './AIPlayer';
export {
    SearchEngine,
    Difficulty,
    PlayStyle,
    OPENING_SCORE,
    WIN_MOVE_SCORE,
    BLOCK_MOVE_SCORE,
    TERMINAL_SCORE
} from './SearchEngine';
export type { SearchEngineOptions, SearchResult, ThinkingStats } from './SearchEngine';
export { createSeededRandom, createRandomSource, pickRandom } from './random';
export type { RandomSource } from './random';

/**
 * ChessSearch - Alpha-Beta Search
 *
 * Implements move selection for the side to move:
 * - Negamax alpha-beta with fail-soft
 * - Iterative deepening, 1..maxDepth
 * - Transposition table keyed by the 64-bit Zobrist hash
 * - Move ordering (hash move, MVV-LVA, promotions, killers, history)
 * - Node and time budgets
 *
 * Pruning never changes the score versus plain minimax at the same depth
 * while the transposition table is off; see minimax() below.
 */

import { z } from 'zod';
import type { Position } from './ChessBoard.js';
import type {
  Move,
  PieceType,
  SearchConfig,
  SearchOptions,
  SearchResult,
  SearchStats,
  TTEntry,
  TTEntryType,
} from './types.js';
import { DEFAULT_SEARCH_CONFIG, DEFAULT_SEARCH_OPTIONS } from './types.js';
import type { Evaluator } from './ChessEvaluator.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import { hasLegalMove, isInCheck, legalMoves, moveKey, sameMove } from './ChessMoveGen.js';
import { PositionHistory, drawReason, historyOf, isTerminal, status } from './ChessGameState.js';
import { GameOverError, InvalidConfigError, InvariantError } from './errors.js';

// =============================================================================
// Constants
// =============================================================================

const INFINITY = 100000;
export const MATE_SCORE = 50000;
export const MATE_THRESHOLD = 49000;

/** Deepest ply the per-ply tables cover */
const MAX_PLY = 64;

/** MVV-LVA values for capture ordering */
const MVV_VALUES: Record<PieceType, number> = {
  p: 1, n: 3, b: 3, r: 5, q: 9, k: 100,
};

const LVA_VALUES: Record<PieceType, number> = {
  p: 6, n: 5, b: 5, r: 4, q: 3, k: 2,
};

const SearchConfigSchema = z.object({
  maxDepth: z.number().int().min(1).max(MAX_PLY - 1),
  timeLimit: z.number().positive().optional(),
  nodeLimit: z.number().int().positive().optional(),
});

// =============================================================================
// Terminal Scores
// =============================================================================

/**
 * Score of a node that ends the game, from the side to move's view,
 * or null when play continues. Mates closer to the root score higher.
 */
function terminalScore(position: Position, history: PositionHistory, ply: number, hasMoves: boolean): number | null {
  if (!hasMoves) {
    return isInCheck(position) ? -(MATE_SCORE - ply) : 0;
  }
  if (ply > 0 && drawReason(position, history) !== null) {
    return 0;
  }
  return null;
}

/** White-relative evaluation turned to the side to move's view */
function evaluateForSideToMove(position: Position, evaluator: Evaluator): number {
  const score = evaluator.evaluate(position);
  return position.turn === 'w' ? score : -score;
}

/** Mate scores are stored relative to the node, not the root */
function scoreToTT(score: number, ply: number): number {
  if (score > MATE_THRESHOLD) return score + ply;
  if (score < -MATE_THRESHOLD) return score - ply;
  return score;
}

function scoreFromTT(score: number, ply: number): number {
  if (score > MATE_THRESHOLD) return score - ply;
  if (score < -MATE_THRESHOLD) return score + ply;
  return score;
}

// =============================================================================
// Transposition Table (Bucket-Based)
// =============================================================================

/**
 * Bucket-based Transposition Table
 * Uses 4 entries per bucket for better replacement.
 * Two positions can share a hash; moves read back from the table are
 * checked against the legal move list before use.
 */
class TranspositionTable {
  private buckets: (TTEntry | null)[][] = [];
  private numBuckets: number;
  private currentAge: number = 0;
  private entries: number = 0;

  constructor(sizeMB: number) {
    // Estimate ~48 bytes per entry, 4 entries per bucket
    const totalEntries = Math.floor((sizeMB * 1024 * 1024) / 48);
    this.numBuckets = Math.max(1, Math.floor(totalEntries / 4));
    this.clear();
  }

  private bucketFor(hash: bigint): (TTEntry | null)[] {
    return this.buckets[Number(hash % BigInt(this.numBuckets))];
  }

  /**
   * Store an entry in the table
   */
  store(hash: bigint, depth: number, score: number, type: TTEntryType, bestMove: Move | null): void {
    const bucket = this.bucketFor(hash);

    // Slot choice: same hash, then empty, then lowest priority
    let replaceIdx = 0;
    let lowestPriority = Infinity;

    for (let i = 0; i < bucket.length; i++) {
      const entry = bucket[i];

      if (!entry) {
        replaceIdx = i;
        break;
      }

      if (entry.hash === hash) {
        if (depth >= entry.depth) {
          replaceIdx = i;
          break;
        }
        return; // Don't replace deeper entry with shallower
      }

      // Old, shallow and non-exact entries go first
      const agePenalty = (this.currentAge - entry.age) * 8;
      const depthValue = entry.depth * 2;
      const typeBonus = entry.type === 'EXACT' ? 4 : 0;
      const priority = depthValue + typeBonus - agePenalty;

      if (priority < lowestPriority) {
        lowestPriority = priority;
        replaceIdx = i;
      }
    }

    if (bucket[replaceIdx] === null) {
      this.entries++;
    }
    bucket[replaceIdx] = {
      hash,
      depth,
      score,
      type,
      bestMove,
      age: this.currentAge,
    };
  }

  probe(hash: bigint): TTEntry | null {
    for (const entry of this.bucketFor(hash)) {
      if (entry && entry.hash === hash) {
        return entry;
      }
    }
    return null;
  }

  /**
   * Start a new iteration (increment age for replacement strategy)
   */
  newSearch(): void {
    this.currentAge++;
  }

  clear(): void {
    this.buckets = [];
    for (let i = 0; i < this.numBuckets; i++) {
      this.buckets.push([null, null, null, null]);
    }
    this.entries = 0;
    this.currentAge = 0;
  }

  /**
   * Get table fill (per mille)
   */
  getHashFull(): number {
    return Math.round((this.entries / (this.numBuckets * 4)) * 1000);
  }

  getSize(): number {
    return this.entries;
  }
}

// =============================================================================
// ChessSearch Class
// =============================================================================

/** Position and game history the current search mutates and restores */
interface SearchContext {
  position: Position;
  history: PositionHistory;
}

export class ChessSearch {
  private options: SearchOptions;
  private evaluator: Evaluator;
  private tt: TranspositionTable;

  // Killer moves (2 per ply)
  private killers: (Move | null)[][] = [];

  // History heuristic, keyed by "from+to"
  private history: Map<string, number> = new Map();

  private stats: SearchStats = this.initStats();

  // Budget
  private budget: SearchConfig = DEFAULT_SEARCH_CONFIG;
  private budgetActive: boolean = false;
  private searchStartTime: number = 0;
  private stopSearch: boolean = false;

  // Principal variation
  private pvTable: Move[][] = [];
  private pvLength: number[] = [];

  constructor(evaluator?: Evaluator, options?: Partial<SearchOptions>) {
    this.options = { ...DEFAULT_SEARCH_OPTIONS, ...options };
    this.evaluator = evaluator ?? new ChessEvaluator();
    this.tt = new TranspositionTable(this.options.ttSizeMB);

    for (let i = 0; i <= MAX_PLY; i++) {
      this.killers[i] = [null, null];
      this.pvTable[i] = [];
      this.pvLength[i] = 0;
    }
  }

  /**
   * Search for the best move for the side to move
   * @param config - Budget; missing fields come from DEFAULT_SEARCH_CONFIG
   * @param gameHistory - Hashes of the game so far, current position last,
   *                      for repetition detection
   * @throws InvalidConfigError when the budget is malformed
   * @throws GameOverError when the position is already decided
   */
  search(position: Position, config: Partial<SearchConfig> = {}, gameHistory?: PositionHistory): SearchResult {
    const parsed = SearchConfigSchema.safeParse({ ...DEFAULT_SEARCH_CONFIG, ...config });
    if (!parsed.success) {
      throw new InvalidConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }

    const ctx: SearchContext = {
      position,
      history: gameHistory ? gameHistory.clone() : historyOf(position),
    };
    const rootStatus = status(position, ctx.history);
    if (isTerminal(rootStatus)) {
      throw new GameOverError(rootStatus);
    }

    this.budget = parsed.data;
    this.stats = this.initStats();
    this.stopSearch = false;
    this.budgetActive = false;
    this.searchStartTime = Date.now();
    this.tt.clear();
    this.history.clear();
    for (const slot of this.killers) {
      slot[0] = null;
      slot[1] = null;
    }

    let bestMove: Move | null = null;
    let bestScore = -INFINITY;
    let completedDepth = 0;
    let pv: Move[] = [];

    // Iterative deepening
    for (let d = 1; d <= this.budget.maxDepth; d++) {
      this.tt.newSearch();
      for (let i = 0; i <= MAX_PLY; i++) {
        this.pvLength[i] = 0;
      }

      const score = this.negamax(ctx, d, -INFINITY, INFINITY, 0);

      if (this.stopSearch) {
        // Keep the last completed iteration
        break;
      }

      if (this.pvLength[0] > 0) {
        pv = this.pvTable[0].slice(0, this.pvLength[0]);
        bestMove = pv[0];
        bestScore = score;
        completedDepth = d;
      }

      if (this.options.verbose) {
        console.log(
          `[Search] depth ${d} score ${score} nodes ${this.stats.nodes} ` +
          `time ${Date.now() - this.searchStartTime}ms pv ${pv.map(moveKey).join(' ')}`
        );
      }

      // The first iteration always completes, so there is a move to fall back on
      this.budgetActive = true;

      // A forced mate cannot be improved on by searching deeper
      if (Math.abs(score) > MATE_THRESHOLD) {
        break;
      }
    }

    if (!bestMove) {
      throw new InvariantError('Search completed without a best move');
    }

    const elapsed = Date.now() - this.searchStartTime;
    this.stats.depth = completedDepth;
    this.stats.time = elapsed;
    this.stats.nps = elapsed > 0 ? Math.round((this.stats.nodes / elapsed) * 1000) : 0;

    return {
      bestMove,
      score: bestScore,
      depth: completedDepth,
      nodes: this.stats.nodes,
      time: elapsed,
      pv,
      aborted: this.stopSearch,
      ttHits: this.stats.ttHits,
      hashFull: this.options.useTranspositionTable ? this.tt.getHashFull() : 0,
      nps: this.stats.nps,
    };
  }

  /**
   * Negamax alpha-beta with fail-soft
   */
  private negamax(ctx: SearchContext, depth: number, alpha: number, beta: number, ply: number): number {
    if (this.shouldStop()) {
      this.stopSearch = true;
      return 0;
    }

    this.stats.nodes++;
    this.pvLength[ply] = 0;
    const { position, history } = ctx;

    if (depth <= 0) {
      const terminal = terminalScore(position, history, ply, hasLegalMove(position));
      return terminal ?? evaluateForSideToMove(position, this.evaluator);
    }

    const moves = legalMoves(position);
    const terminal = terminalScore(position, history, ply, moves.length > 0);
    if (terminal !== null) {
      return terminal;
    }

    // Probe transposition table
    let ttMove: Move | null = null;
    if (this.options.useTranspositionTable && ply > 0) {
      const entry = this.tt.probe(position.hash);
      if (entry) {
        if (entry.bestMove) {
          const stored = entry.bestMove;
          ttMove = moves.find(m => sameMove(m, stored)) ?? null;
          if (!ttMove) {
            console.warn(`[Search] Ignoring table move ${moveKey(stored)}: not legal in this position`);
          }
        }

        if (entry.depth >= depth) {
          this.stats.ttHits++;
          const score = scoreFromTT(entry.score, ply);
          if (
            entry.type === 'EXACT' ||
            (entry.type === 'LOWER' && score >= beta) ||
            (entry.type === 'UPPER' && score <= alpha)
          ) {
            this.stats.ttCutoffs++;
            return score;
          }
        }
      }
    }

    const ordered = this.options.useMoveOrdering ? this.orderMoves(moves, ply, ttMove) : moves;

    let bestScore = -INFINITY;
    let bestMove: Move | null = null;
    const origAlpha = alpha;

    for (const move of ordered) {
      const record = position.makeMove(move);
      history.push(position.hash);
      let score: number;
      try {
        score = -this.negamax(ctx, depth - 1, -beta, -alpha, ply + 1);
      } finally {
        history.pop();
        position.unmakeMove(record);
      }

      if (this.stopSearch) return 0;

      if (score > bestScore) {
        bestScore = score;
        bestMove = move;

        if (score > alpha) {
          alpha = score;

          // Update PV
          this.pvTable[ply][0] = move;
          for (let i = 0; i < this.pvLength[ply + 1]; i++) {
            this.pvTable[ply][i + 1] = this.pvTable[ply + 1][i];
          }
          this.pvLength[ply] = this.pvLength[ply + 1] + 1;

          if (score >= beta) {
            this.stats.betaCutoffs++;
            if (!move.captured) {
              this.updateKillers(move, ply);
              this.updateHistory(move, depth);
            }
            break;
          }
        }
      }
    }

    if (this.options.useTranspositionTable) {
      let ttType: TTEntryType;
      if (bestScore <= origAlpha) {
        ttType = 'UPPER';
      } else if (bestScore >= beta) {
        ttType = 'LOWER';
      } else {
        ttType = 'EXACT';
      }
      this.tt.store(position.hash, depth, scoreToTT(bestScore, ply), ttType, bestMove);
    }

    return bestScore;
  }

  /**
   * Order moves for better pruning
   * Priority: TT move > Captures (MVV-LVA) > Promotions > Killers > History > Quiet
   */
  private orderMoves(moves: Move[], ply: number, ttMove: Move | null): Move[] {
    const killers = this.killers[ply];
    const scored = moves.map(move => {
      let score = 0;

      if (ttMove && sameMove(move, ttMove)) {
        score = 10000000;
      } else if (move.captured) {
        score = 2000000 + this.mvvLva(move);
      } else if (move.promotion) {
        score = 1900000 + MVV_VALUES[move.promotion] * 100;
      } else if (this.options.useKillerMoves && killers[0] && sameMove(move, killers[0])) {
        score = 900000;
      } else if (this.options.useKillerMoves && killers[1] && sameMove(move, killers[1])) {
        score = 800000;
      } else if (this.options.useHistoryHeuristic) {
        score = this.history.get(`${move.from}${move.to}`) ?? 0;
      }

      return { move, score };
    });

    // Array.prototype.sort is stable, so equal scores keep generator order
    scored.sort((a, b) => b.score - a.score);
    return scored.map(s => s.move);
  }

  /**
   * MVV-LVA scoring for captures
   */
  private mvvLva(move: Move): number {
    if (!move.captured) return 0;
    return MVV_VALUES[move.captured] * 10 + LVA_VALUES[move.piece];
  }

  private updateKillers(move: Move, ply: number): void {
    if (!this.options.useKillerMoves) return;
    const slot = this.killers[ply];
    if (!slot[0] || !sameMove(slot[0], move)) {
      slot[1] = slot[0];
      slot[0] = move;
    }
  }

  private updateHistory(move: Move, depth: number): void {
    if (!this.options.useHistoryHeuristic) return;
    const key = `${move.from}${move.to}`;
    this.history.set(key, (this.history.get(key) ?? 0) + depth * depth);
  }

  /**
   * Budget check. The node limit is checked on every node, the clock every
   * 1024 nodes. Inactive until the first iteration has completed.
   */
  private shouldStop(): boolean {
    if (this.stopSearch) return true;
    if (!this.budgetActive) return false;

    const { nodeLimit, timeLimit } = this.budget;
    if (nodeLimit !== undefined && this.stats.nodes >= nodeLimit) {
      return true;
    }
    if (timeLimit !== undefined && this.stats.nodes % 1024 === 0) {
      return Date.now() - this.searchStartTime >= timeLimit;
    }
    return false;
  }

  private initStats(): SearchStats {
    return {
      nodes: 0,
      depth: 0,
      time: 0,
      nps: 0,
      ttHits: 0,
      ttCutoffs: 0,
      betaCutoffs: 0,
    };
  }

  /**
   * Get statistics of the last search
   */
  getStats(): SearchStats {
    return { ...this.stats };
  }

  clearTT(): void {
    this.tt.clear();
  }

  /**
   * Get transposition table size (stored entries)
   */
  getTTSize(): number {
    return this.tt.getSize();
  }

  /**
   * Update options; a new table size reallocates the table
   */
  setOptions(options: Partial<SearchOptions>): void {
    const sizeChanged = options.ttSizeMB !== undefined && options.ttSizeMB !== this.options.ttSizeMB;
    this.options = { ...this.options, ...options };
    if (sizeChanged) {
      this.tt = new TranspositionTable(this.options.ttSizeMB);
    }
  }

  getOptions(): SearchOptions {
    return { ...this.options };
  }
}

/**
 * Create a new search instance
 */
export function createChessSearch(evaluator?: Evaluator, options?: Partial<SearchOptions>): ChessSearch {
  return new ChessSearch(evaluator, options);
}

// =============================================================================
// Reference Minimax
// =============================================================================

/**
 * Plain negamax without pruning, ordering or table. Same terminal and draw
 * rules as ChessSearch, so both agree on the score at equal depth.
 * @returns Score from the side to move's view and a best move (null when
 *          the position is already decided)
 */
export function minimax(
  position: Position,
  depth: number,
  evaluator: Evaluator = new ChessEvaluator(),
  gameHistory?: PositionHistory,
): { score: number; bestMove: Move | null } {
  const history = gameHistory ? gameHistory.clone() : historyOf(position);

  const visit = (remaining: number, ply: number): { score: number; bestMove: Move | null } => {
    if (remaining <= 0) {
      const terminal = terminalScore(position, history, ply, hasLegalMove(position));
      return { score: terminal ?? evaluateForSideToMove(position, evaluator), bestMove: null };
    }

    const moves = legalMoves(position);
    const terminal = terminalScore(position, history, ply, moves.length > 0);
    if (terminal !== null) {
      return { score: terminal, bestMove: null };
    }

    let best = -INFINITY;
    let bestMove: Move | null = null;
    for (const move of moves) {
      const record = position.makeMove(move);
      history.push(position.hash);
      let score: number;
      try {
        score = -visit(remaining - 1, ply + 1).score;
      } finally {
        history.pop();
        position.unmakeMove(record);
      }
      if (score > best) {
        best = score;
        bestMove = move;
      }
    }
    return { score: best, bestMove };
  };

  return visit(depth, 0);
}

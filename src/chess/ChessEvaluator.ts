/**
 * ChessEvaluator - Position evaluation function
 *
 * Implements the evaluation used by the search, including:
 * - Material balance
 * - Piece-square tables (positional bonuses)
 * - Pawn structure analysis
 * - Mobility evaluation
 * - King safety
 * - Center control
 * - Game phase tapering (blend opening and endgame values)
 *
 * All values are in centipawns from White's perspective (positive = White advantage).
 * Weights are starting points, not tuned coefficients.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Position } from './ChessBoard.js';
import type {
  Color,
  EvaluationBreakdown,
  EvaluatorConfig,
  PawnStructure,
  PieceType,
  Square,
} from './types.js';
import { PIECE_VALUES, fileOf, rankOf, squareToIndex } from './types.js';
import { getPieceKey } from './ChessZobrist.js';
import { generatePseudoLegalMoves } from './ChessMoveGen.js';

// =============================================================================
// Evaluator Contract
// =============================================================================

/** Static evaluation strategy used by the search */
export interface Evaluator {
  /** Score in centipawns from White's perspective */
  evaluate(position: Position): number;
}

/**
 * Material count only, with the standard piece values
 */
export class MaterialEvaluator implements Evaluator {
  evaluate(position: Position): number {
    let score = 0;
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece && piece.type !== 'k') {
        score += piece.color === 'w' ? PIECE_VALUES[piece.type] : -PIECE_VALUES[piece.type];
      }
    }
    return score;
  }
}

// =============================================================================
// Material Values (Centipawns)
// =============================================================================

/** Middlegame piece values */
const MG_PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 0,
};

/** Endgame piece values */
const EG_PIECE_VALUES: Record<PieceType, number> = {
  p: 120,  // Pawns more valuable in endgame
  n: 300,  // Knights slightly weaker
  b: 320,
  r: 520,
  q: 900,
  k: 0,
};

/** Phase values for determining game phase */
const PHASE_VALUES: Record<PieceType, number> = {
  p: 0,
  n: 1,
  b: 1,
  r: 2,
  q: 4,
  k: 0,
};

const TOTAL_PHASE = 24; // 4N + 4B + 4R + 2Q = 4 + 4 + 8 + 8 = 24

// =============================================================================
// Piece-Square Tables
// =============================================================================

/*
 * Tables live in data/piece-square-tables.json. Row 0 = rank 8, row 7 = rank 1,
 * from White's side; black pieces read them flipped vertically. Endgame tables
 * that are missing fall back to the middlegame table.
 */

const TableSchema = z.array(z.array(z.number().int()).length(8)).length(8);

const PieceTablesSchema = z.object({
  p: TableSchema,
  n: TableSchema,
  b: TableSchema,
  r: TableSchema,
  q: TableSchema,
  k: TableSchema,
});

const PieceSquareTablesSchema = z.object({
  mg: PieceTablesSchema,
  eg: PieceTablesSchema.partial(),
});

type PieceTables = z.infer<typeof PieceTablesSchema>;

function loadPieceSquareTables(): { mg: PieceTables; eg: PieceTables } {
  const raw = readFileSync(new URL('../../data/piece-square-tables.json', import.meta.url), 'utf8');
  const { mg, eg } = PieceSquareTablesSchema.parse(JSON.parse(raw));
  return { mg, eg: { ...mg, ...eg } };
}

const { mg: PST_MG, eg: PST_EG } = loadPieceSquareTables();

// =============================================================================
// Evaluation Constants
// =============================================================================

/** Bonus for bishop pair */
const BISHOP_PAIR_BONUS = 30;

/** Pawn structure penalties */
const DOUBLED_PAWN_PENALTY = -10;
const ISOLATED_PAWN_PENALTY = -20;

/** Pawn structure bonuses */
const PASSED_PAWN_BONUS = [0, 10, 20, 30, 50, 70, 90, 0]; // By relative rank
const CONNECTED_PAWN_BONUS = 5;

/** Rook bonuses */
const ROOK_OPEN_FILE_BONUS = 15;
const ROOK_SEMI_OPEN_FILE_BONUS = 10;
const ROOK_ON_SEVENTH_BONUS = 20;

/** King safety */
const KING_PAWN_SHIELD_BONUS = 10; // Per pawn

/** Mobility weights, per pseudo-legal move */
const MOBILITY_WEIGHTS: Record<PieceType, number> = {
  p: 0,
  n: 4,
  b: 5,
  r: 2,
  q: 1,
  k: 0,
};

/** Center squares */
const CENTER_SQUARES: Square[] = ['d4', 'd5', 'e4', 'e5'];

// =============================================================================
// Pawn Hash Table
// =============================================================================

/**
 * Pawn hash table for caching pawn structure evaluation.
 * Keyed by the XOR of the pawns' Zobrist keys, so the key only changes
 * when a pawn moves or disappears.
 */
class PawnHashTable {
  private table: Map<bigint, number> = new Map();
  private maxSize: number;
  private hits: number = 0;
  private misses: number = 0;

  constructor(maxSize: number = 50000) {
    this.maxSize = maxSize;
  }

  getPawnKey(position: Position): bigint {
    let key = 0n;
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece && piece.type === 'p') {
        key ^= getPieceKey(piece.color, 'p', index);
      }
    }
    return key;
  }

  probe(key: bigint): number | undefined {
    const score = this.table.get(key);
    if (score !== undefined) {
      this.hits++;
      return score;
    }
    this.misses++;
    return undefined;
  }

  store(key: bigint, score: number): void {
    // Evict if table is full
    if (this.table.size >= this.maxSize) {
      // Simple eviction: delete the oldest 25% of entries
      const keysToDelete = Array.from(this.table.keys()).slice(0, Math.floor(this.maxSize / 4));
      for (const k of keysToDelete) {
        this.table.delete(k);
      }
    }
    this.table.set(key, score);
  }

  clear(): void {
    this.table.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): { hits: number; misses: number; size: number; hitRate: number } {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.table.size,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}

/** Pawn ranks (0-7) per file for one color */
type PawnFiles = number[][];

// =============================================================================
// ChessEvaluator Class
// =============================================================================

export class ChessEvaluator implements Evaluator {
  private config: Required<Omit<EvaluatorConfig, 'pieceValues'>>;
  private mgValues: Record<PieceType, number>;
  private egValues: Record<PieceType, number>;
  private pawnHash: PawnHashTable;

  constructor(config: EvaluatorConfig = {}) {
    this.config = {
      evaluateKingSafety: config.evaluateKingSafety ?? true,
      evaluatePawnStructure: config.evaluatePawnStructure ?? true,
      evaluateMobility: config.evaluateMobility ?? true,
    };

    const custom = config.pieceValues;
    if (custom) {
      const values: Record<PieceType, number> = {
        p: custom.pawn,
        n: custom.knight,
        b: custom.bishop,
        r: custom.rook,
        q: custom.queen,
        k: 0,
      };
      this.mgValues = values;
      this.egValues = values;
    } else {
      this.mgValues = MG_PIECE_VALUES;
      this.egValues = EG_PIECE_VALUES;
    }

    this.pawnHash = new PawnHashTable();
  }

  /**
   * Evaluate a position
   * Note: Does NOT check for checkmate/draw as the search handles these
   * @returns Evaluation in centipawns (positive = white advantage)
   */
  evaluate(position: Position): number {
    return this.getEvaluationBreakdown(position).total;
  }

  /**
   * Get detailed evaluation breakdown
   */
  getEvaluationBreakdown(position: Position): EvaluationBreakdown {
    const phase = this.calculatePhase(position);

    const material = this.evaluateMaterial(position, phase);
    const pieceSquares = this.evaluatePieceSquares(position, phase);
    const pawnStructure = this.config.evaluatePawnStructure
      ? this.evaluatePawnStructure(position)
      : 0;
    const mobility = this.config.evaluateMobility
      ? this.evaluateMobility(position)
      : 0;
    const kingSafety = this.config.evaluateKingSafety
      ? this.evaluateKingSafety(position, phase)
      : 0;
    const centerControl = this.evaluateCenterControl(position);
    const bishopPair = this.evaluateBishopPair(position);
    const rookOpenFile = this.evaluateRookOpenFiles(position);

    const total = material + pieceSquares + pawnStructure + mobility +
                  kingSafety + centerControl + bishopPair + rookOpenFile;

    return {
      material,
      pieceSquares,
      pawnStructure,
      mobility,
      kingSafety,
      centerControl,
      bishopPair,
      rookOpenFile,
      total: Math.round(total),
      gamePhase: phase,
    };
  }

  /**
   * Calculate game phase (0 = endgame, 256 = opening)
   */
  private calculatePhase(position: Position): number {
    let phase = 0;
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece) {
        phase += PHASE_VALUES[piece.type];
      }
    }
    return Math.min(256, Math.round((phase / TOTAL_PHASE) * 256));
  }

  /**
   * Evaluate material with tapered values
   */
  private evaluateMaterial(position: Position, phase: number): number {
    let mgScore = 0;
    let egScore = 0;

    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (!piece) continue;
      const sign = piece.color === 'w' ? 1 : -1;
      mgScore += sign * this.mgValues[piece.type];
      egScore += sign * this.egValues[piece.type];
    }

    return this.taperScore(mgScore, egScore, phase);
  }

  /**
   * Evaluate piece-square tables with tapered values
   */
  private evaluatePieceSquares(position: Position, phase: number): number {
    let mgScore = 0;
    let egScore = 0;

    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (!piece) continue;

      const file = fileOf(index);
      const row = piece.color === 'w' ? 7 - rankOf(index) : rankOf(index);
      const sign = piece.color === 'w' ? 1 : -1;

      mgScore += sign * PST_MG[piece.type][row][file];
      egScore += sign * PST_EG[piece.type][row][file];
    }

    return this.taperScore(mgScore, egScore, phase);
  }

  private taperScore(mgScore: number, egScore: number, phase: number): number {
    return Math.round((mgScore * phase + egScore * (256 - phase)) / 256);
  }

  /**
   * Evaluate pawn structure (with hash table caching)
   */
  private evaluatePawnStructure(position: Position): number {
    const pawnKey = this.pawnHash.getPawnKey(position);
    const cached = this.pawnHash.probe(pawnKey);
    if (cached !== undefined) {
      return cached;
    }

    const whitePawns = this.getPawnsByFile(position, 'w');
    const blackPawns = this.getPawnsByFile(position, 'b');

    const score =
      this.evaluatePawnStructureForColor(whitePawns, blackPawns, 'w') -
      this.evaluatePawnStructureForColor(blackPawns, whitePawns, 'b');

    this.pawnHash.store(pawnKey, score);
    return score;
  }

  private getPawnsByFile(position: Position, color: Color): PawnFiles {
    const pawns: PawnFiles = Array.from({ length: 8 }, () => []);
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece && piece.type === 'p' && piece.color === color) {
        pawns[fileOf(index)].push(rankOf(index));
      }
    }
    return pawns;
  }

  private evaluatePawnStructureForColor(ownPawns: PawnFiles, oppPawns: PawnFiles, color: Color): number {
    let score = 0;

    for (let file = 0; file < 8; file++) {
      const pawnsOnFile = ownPawns[file];

      if (pawnsOnFile.length > 1) {
        score += DOUBLED_PAWN_PENALTY * (pawnsOnFile.length - 1);
      }

      for (const rank of pawnsOnFile) {
        if (!this.hasNeighbor(ownPawns, file)) {
          score += ISOLATED_PAWN_PENALTY;
        }

        if (this.isPassedPawn(file, rank, oppPawns, color)) {
          const relativeRank = color === 'w' ? rank : 7 - rank;
          score += PASSED_PAWN_BONUS[relativeRank] ?? 0;
        }

        if (file > 0 && ownPawns[file - 1].includes(rank)) {
          score += CONNECTED_PAWN_BONUS;
        }
      }
    }

    return score;
  }

  private hasNeighbor(ownPawns: PawnFiles, file: number): boolean {
    return (file > 0 && ownPawns[file - 1].length > 0) ||
           (file < 7 && ownPawns[file + 1].length > 0);
  }

  /**
   * No enemy pawn ahead on the same or an adjacent file
   */
  private isPassedPawn(file: number, rank: number, oppPawns: PawnFiles, color: Color): boolean {
    for (let f = Math.max(0, file - 1); f <= Math.min(7, file + 1); f++) {
      for (const oppRank of oppPawns[f]) {
        if (color === 'w' && oppRank > rank) return false;
        if (color === 'b' && oppRank < rank) return false;
      }
    }
    return true;
  }

  /**
   * Weighted pseudo-legal move counts, White minus Black
   */
  private evaluateMobility(position: Position): number {
    let score = 0;
    for (const move of generatePseudoLegalMoves(position, 'w')) {
      score += MOBILITY_WEIGHTS[move.piece];
    }
    for (const move of generatePseudoLegalMoves(position, 'b')) {
      score -= MOBILITY_WEIGHTS[move.piece];
    }
    return score;
  }

  /**
   * Pawn shield in front of a king still on its first two ranks,
   * scaled down as material comes off
   */
  private evaluateKingSafety(position: Position, phase: number): number {
    if (phase < 64) return 0; // Skip in endgame

    const white = this.evaluatePawnShield(position, 'w');
    const black = this.evaluatePawnShield(position, 'b');

    return Math.round(((white - black) * phase) / 256);
  }

  private evaluatePawnShield(position: Position, color: Color): number {
    const king = position.kingIndex(color);
    const kingFile = fileOf(king);
    const kingRank = rankOf(king);
    const homeRanks = color === 'w' ? [0, 1] : [6, 7];
    if (!homeRanks.includes(kingRank)) return 0;

    const shieldRank = kingRank + (color === 'w' ? 1 : -1);
    let score = 0;
    for (let f = Math.max(0, kingFile - 1); f <= Math.min(7, kingFile + 1); f++) {
      const piece = position.pieceAtIndex(shieldRank * 8 + f);
      if (piece?.type === 'p' && piece.color === color) {
        score += KING_PAWN_SHIELD_BONUS;
      }
    }
    return score;
  }

  private evaluateCenterControl(position: Position): number {
    let score = 0;
    for (const sq of CENTER_SQUARES) {
      const piece = position.pieceAtIndex(squareToIndex(sq));
      if (piece) {
        const bonus = piece.type === 'p' ? 10 : 5;
        score += piece.color === 'w' ? bonus : -bonus;
      }
    }
    return score;
  }

  private evaluateBishopPair(position: Position): number {
    let whiteBishops = 0, blackBishops = 0;
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece?.type === 'b') {
        if (piece.color === 'w') whiteBishops++;
        else blackBishops++;
      }
    }

    let score = 0;
    if (whiteBishops >= 2) score += BISHOP_PAIR_BONUS;
    if (blackBishops >= 2) score -= BISHOP_PAIR_BONUS;
    return score;
  }

  /**
   * Rooks on open/semi-open files and on the seventh rank
   */
  private evaluateRookOpenFiles(position: Position): number {
    const pawnFiles: Record<Color, Set<number>> = { w: new Set(), b: new Set() };
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece?.type === 'p') {
        pawnFiles[piece.color].add(fileOf(index));
      }
    }

    let score = 0;
    for (let index = 0; index < 64; index++) {
      const piece = position.pieceAtIndex(index);
      if (piece?.type !== 'r') continue;

      const file = fileOf(index);
      const hasOwnPawn = pawnFiles[piece.color].has(file);
      const hasOppPawn = pawnFiles[piece.color === 'w' ? 'b' : 'w'].has(file);

      let bonus = 0;
      if (!hasOwnPawn && !hasOppPawn) {
        bonus = ROOK_OPEN_FILE_BONUS;
      } else if (!hasOwnPawn) {
        bonus = ROOK_SEMI_OPEN_FILE_BONUS;
      }

      const seventh = piece.color === 'w' ? 6 : 1;
      if (rankOf(index) === seventh) {
        bonus += ROOK_ON_SEVENTH_BONUS;
      }

      score += piece.color === 'w' ? bonus : -bonus;
    }

    return score;
  }

  /**
   * Analyze pawn structure for a position
   */
  analyzePawnStructure(position: Position): { white: PawnStructure; black: PawnStructure } {
    const whitePawns = this.getPawnsByFile(position, 'w');
    const blackPawns = this.getPawnsByFile(position, 'b');

    return {
      white: this.getPawnStructureDetails(whitePawns, blackPawns, 'w'),
      black: this.getPawnStructureDetails(blackPawns, whitePawns, 'b'),
    };
  }

  private getPawnStructureDetails(ownPawns: PawnFiles, oppPawns: PawnFiles, color: Color): PawnStructure {
    let doubled = 0, isolated = 0, passed = 0, connected = 0;
    let islands = 0;
    let inIsland = false;

    for (let file = 0; file < 8; file++) {
      const pawnsOnFile = ownPawns[file];

      if (pawnsOnFile.length === 0) {
        inIsland = false;
        continue;
      }
      if (!inIsland) {
        islands++;
        inIsland = true;
      }

      if (pawnsOnFile.length > 1) {
        doubled += pawnsOnFile.length - 1;
      }

      for (const rank of pawnsOnFile) {
        if (!this.hasNeighbor(ownPawns, file)) isolated++;
        if (this.isPassedPawn(file, rank, oppPawns, color)) passed++;
        if (file > 0 && ownPawns[file - 1].includes(rank)) connected++;
      }
    }

    return { doubled, isolated, passed, connected, islands };
  }

  clearPawnHash(): void {
    this.pawnHash.clear();
  }

  getPawnHashStats(): { hits: number; misses: number; size: number; hitRate: number } {
    return this.pawnHash.getStats();
  }
}

/**
 * Create a new evaluator instance
 */
export function createChessEvaluator(config?: EvaluatorConfig): ChessEvaluator {
  return new ChessEvaluator(config);
}

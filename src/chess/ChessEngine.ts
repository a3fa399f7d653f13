/**
 * ChessEngine - Game management on top of the core
 *
 * Two layers:
 * - Functional API (newGame, apply, bestMove) over Position values
 * - ChessEngine, a stateful game with undo, captured pieces, repetition
 *   history and state snapshots for external collaborators
 */

import { Position } from './ChessBoard.js';
import type { UndoRecord } from './ChessBoard.js';
import type {
  CastlingRights,
  ChessState,
  Color,
  GameStatus,
  Move,
  MoveInput,
  Piece,
  SearchConfig,
  SearchOptions,
  SearchResult,
  Square,
} from './types.js';
import { STARTING_FEN } from './types.js';
import { findLegalMove, isSquareAttacked, legalMoves, moveKey } from './ChessMoveGen.js';
import {
  CapturedSet,
  PositionHistory,
  captureBalance,
  historyOf,
  isTerminal,
  materialPoints,
  status,
} from './ChessGameState.js';
import type { Evaluator } from './ChessEvaluator.js';
import { ChessSearch } from './ChessSearch.js';
import { ascii, isCoordinateMove, parseCoordinateMove, parseFen, parseSan, toFen, toSan } from './ChessNotation.js';
import { GameOverError, NoHistoryError } from './errors.js';

// =============================================================================
// Functional API
// =============================================================================

/**
 * Standard starting arrangement
 */
export function newGame(): Position {
  return Position.initial();
}

/**
 * Play a move and return the resulting position; the input is untouched
 * @param history - Game history for draw detection (default: this position alone)
 * @throws GameOverError when the position is already decided
 * @throws IllegalMoveError / IncompleteMoveError when the move is not legal
 */
export function apply(position: Position, input: MoveInput, history?: PositionHistory): Position {
  const current = status(position, history ?? historyOf(position));
  if (isTerminal(current)) {
    throw new GameOverError(current);
  }

  const move = findLegalMove(position, input);
  const next = position.clone();
  next.makeMove(move);
  return next;
}

/**
 * Search the position and return the chosen move
 */
export function bestMove(position: Position, config: Partial<SearchConfig> = {}, evaluator?: Evaluator): Move {
  return new ChessSearch(evaluator).search(position, config).bestMove;
}

// =============================================================================
// ChessEngine Class
// =============================================================================

/** Engine configuration */
export interface ChessEngineConfig {
  /** Starting position (default: standard) */
  initialFen?: string;
  /** Evaluation used by bestMove()/analyze() */
  evaluator?: Evaluator;
  /** Search tuning */
  searchOptions?: Partial<SearchOptions>;
}

/** A played move with what undo() needs */
interface PlayedMove {
  record: UndoRecord;
  san: string;
}

export class ChessEngine {
  private config: ChessEngineConfig;
  private board: Position;
  private played: PlayedMove[] = [];
  private positions: PositionHistory;
  private captured: CapturedSet = new CapturedSet();
  private search: ChessSearch;

  constructor(config: ChessEngineConfig = {}) {
    this.config = {
      initialFen: STARTING_FEN,
      ...config,
    };
    this.board = this.config.initialFen ? parseFen(this.config.initialFen) : Position.initial();
    this.positions = historyOf(this.board);
    this.search = new ChessSearch(this.config.evaluator, this.config.searchOptions);
  }

  // ===========================================================================
  // Core Game Methods
  // ===========================================================================

  /**
   * Make a move on the board
   * @param move - MoveInput, coordinate notation ("e2e4", "e7e8q") or SAN ("Nf3")
   * @returns The move made
   * @throws GameOverError, IllegalMoveError, IncompleteMoveError
   */
  move(move: string | MoveInput): Move {
    const current = this.status();
    if (isTerminal(current)) {
      throw new GameOverError(current);
    }

    const resolved = this.resolve(move);
    const san = toSan(this.board, resolved);

    const record = this.board.makeMove(resolved);
    this.played.push({ record, san });
    this.positions.push(this.board.hash);
    this.captured.record(resolved);

    return resolved;
  }

  private resolve(move: string | MoveInput): Move {
    if (typeof move !== 'string') {
      return findLegalMove(this.board, move);
    }
    if (isCoordinateMove(move)) {
      return findLegalMove(this.board, parseCoordinateMove(move));
    }
    return parseSan(this.board, move);
  }

  /**
   * Undo the last move
   * @returns The undone move
   * @throws NoHistoryError when no move has been played
   */
  undo(): Move {
    const last = this.played.pop();
    if (!last) {
      throw new NoHistoryError();
    }

    this.board.unmakeMove(last.record);
    this.positions.pop();
    this.captured.retract(last.record.move);

    return last.record.move;
  }

  /**
   * Reset to the configured starting position, or to a FEN
   * @throws InvalidFenError
   */
  reset(fen?: string): void {
    this.board = parseFen(fen ?? this.config.initialFen ?? STARTING_FEN);
    this.played = [];
    this.positions = historyOf(this.board);
    this.captured.clear();
  }

  /**
   * Load a position from FEN, clearing the game history
   * @throws InvalidFenError
   */
  load(fen: string): void {
    this.reset(fen);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  status(): GameStatus {
    return status(this.board, this.positions);
  }

  isGameOver(): boolean {
    return isTerminal(this.status());
  }

  legalMoves(): Move[] {
    return legalMoves(this.board);
  }

  /**
   * Legal moves from one square
   */
  getMovesForSquare(square: Square): Move[] {
    return this.legalMoves().filter(m => m.from === square);
  }

  isLegalMove(move: MoveInput): boolean {
    return this.legalMoves().some(m => moveKey(m) === moveKey(move));
  }

  /** Copy of the current position */
  position(): Position {
    return this.board.clone();
  }

  fen(): string {
    return toFen(this.board);
  }

  ascii(): string {
    return ascii(this.board);
  }

  turn(): Color {
    return this.board.turn;
  }

  getSquare(square: Square): Piece | null {
    return this.board.pieceAt(square);
  }

  isAttacked(square: Square, byColor: Color): boolean {
    return isSquareAttacked(this.board, square, byColor);
  }

  getCastlingRights(): CastlingRights {
    return { ...this.board.castling };
  }

  // ===========================================================================
  // History
  // ===========================================================================

  /** Moves played, in SAN */
  history(): string[] {
    return this.played.map(p => p.san);
  }

  historyVerbose(): Move[] {
    return this.played.map(p => p.record.move);
  }

  getLastMove(): Move | null {
    const last = this.played[this.played.length - 1];
    return last ? last.record.move : null;
  }

  /** Copy of the position hashes played through, current last */
  positionHistory(): PositionHistory {
    return this.positions.clone();
  }

  /**
   * How many times the current position has occurred
   */
  getRepetitionCount(): number {
    return this.positions.count(this.board.hash);
  }

  // ===========================================================================
  // Material
  // ===========================================================================

  /** Pieces of `color` captured so far, in capture order */
  capturedPieces(color: Color): readonly Piece[] {
    return this.captured.get(color);
  }

  /** Point value of `color`'s pieces still on the board */
  materialPoints(color: Color): number {
    return materialPoints(this.board.pieces(color));
  }

  /** Captured material balance in points, positive when White is ahead */
  captureBalance(): number {
    return captureBalance(this.captured);
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Full search result for the current position
   * @throws GameOverError, InvalidConfigError
   */
  analyze(config: Partial<SearchConfig> = {}): SearchResult {
    return this.search.search(this.board, config, this.positions);
  }

  bestMove(config: Partial<SearchConfig> = {}): Move {
    return this.analyze(config).bestMove;
  }

  // ===========================================================================
  // State Export
  // ===========================================================================

  /**
   * Snapshot of the game for external collaborators (UI, persistence)
   */
  getState(): ChessState {
    const current = this.status();

    return {
      fen: this.fen(),
      turn: this.board.turn,
      moveNumber: this.board.fullMoveNumber,
      halfMoveClock: this.board.halfMoveClock,
      status: current,
      isGameOver: isTerminal(current),
      legalMoves: this.legalMoves().map(moveKey),
      lastMove: this.getLastMove(),
      history: this.history(),
      capturedPieces: this.captured.toJSON(),
      castling: this.getCastlingRights(),
      enPassant: this.board.enPassant,
    };
  }
}

/**
 * Create a new chess engine instance
 */
export function createChessEngine(config?: ChessEngineConfig): ChessEngine {
  return new ChessEngine(config);
}

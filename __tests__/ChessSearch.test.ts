/**
 * Search Tests
 *
 * - Mate finding and tactical captures
 * - Agreement with plain minimax while the table is off
 * - Budgets, determinism and position restoration
 * - Configuration errors
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Position } from '../src/chess/ChessBoard.js';
import { MaterialEvaluator } from '../src/chess/ChessEvaluator.js';
import { historyOf } from '../src/chess/ChessGameState.js';
import { findLegalMove, moveKey } from '../src/chess/ChessMoveGen.js';
import { ChessSearch, MATE_SCORE, createChessSearch, minimax } from '../src/chess/ChessSearch.js';
import { parseCoordinateMove, parseFen, toFen } from '../src/chess/ChessNotation.js';
import { GameOverError, InvalidConfigError } from '../src/chess/errors.js';

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Move Selection
// =============================================================================

describe('ChessSearch move selection', () => {
  it('should find a back-rank mate in one for White', () => {
    const result = new ChessSearch().search(parseFen('6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1'), { maxDepth: 4 });

    expect(moveKey(result.bestMove)).toBe('a1a8');
    expect(result.score).toBe(MATE_SCORE - 1);
    expect(result.depth).toBe(1);
    expect(result.pv.map(moveKey)).toEqual(['a1a8']);
  });

  it('should find a back-rank mate in one for Black', () => {
    const result = new ChessSearch().search(parseFen('r5k1/8/8/8/8/8/5PPP/6K1 b - - 0 1'), { maxDepth: 3 });

    expect(moveKey(result.bestMove)).toBe('a8a1');
    expect(result.score).toBe(MATE_SCORE - 1);
  });

  it('should take a hanging queen', () => {
    const search = new ChessSearch(new MaterialEvaluator());
    const result = search.search(parseFen('4k3/8/8/3q4/8/8/8/3RK3 w - - 0 1'), { maxDepth: 2 });

    expect(moveKey(result.bestMove)).toBe('d1d5');
    expect(result.score).toBe(500);
  });

  it('should return a legal move from the starting position', () => {
    const position = Position.initial();
    const result = createChessSearch().search(position, { maxDepth: 2 });

    expect(() => findLegalMove(position, result.bestMove)).not.toThrow();
    expect(result.depth).toBe(2);
    expect(result.aborted).toBe(false);
  });
});

// =============================================================================
// Minimax Agreement
// =============================================================================

describe('Agreement with minimax', () => {
  const positions = [
    Position.initial(),
    parseFen('4k3/8/8/3q4/8/8/8/3RK3 w - - 0 1'),
    parseFen('r3k2r/ppp2ppp/2n5/3pp3/3PP3/2N5/PPP2PPP/R3K2R w KQkq - 0 8'),
    parseFen('4k3/1P6/8/8/8/8/6p1/4K3 b - - 0 40'),
  ];

  it.each([1, 2, 3])('should match minimax scores at depth %i with the table off', depth => {
    const evaluator = new MaterialEvaluator();
    const search = new ChessSearch(evaluator, { useTranspositionTable: false });

    for (const position of positions) {
      const expected = minimax(position, depth, evaluator).score;
      const result = search.search(position, { maxDepth: depth });
      expect(result.score).toBe(expected);
    }
  });

  it('should match without move ordering too', () => {
    const evaluator = new MaterialEvaluator();
    const search = new ChessSearch(evaluator, {
      useTranspositionTable: false,
      useMoveOrdering: false,
    });

    for (const position of positions) {
      expect(search.search(position, { maxDepth: 2 }).score).toBe(minimax(position, 2, evaluator).score);
    }
  });

  it('should score a decided position in minimax', () => {
    const position = Position.initial();
    for (const text of ['f2f3', 'e7e5', 'g2g4', 'd8h4']) {
      position.makeMove(findLegalMove(position, parseCoordinateMove(text)));
    }
    expect(minimax(position, 2)).toEqual({ score: -MATE_SCORE, bestMove: null });
  });
});

// =============================================================================
// State Discipline
// =============================================================================

describe('Search state discipline', () => {
  it('should leave the position unchanged', () => {
    const position = parseFen('r3k2r/ppp2ppp/2n5/3pp3/3PP3/2N5/PPP2PPP/R3K2R w KQkq - 0 8');
    const fen = toFen(position);
    const hash = position.hash;

    new ChessSearch().search(position, { maxDepth: 3 });

    expect(toFen(position)).toBe(fen);
    expect(position.hash).toBe(hash);
  });

  it('should leave the caller history unchanged', () => {
    const position = Position.initial();
    const history = historyOf(position);

    new ChessSearch().search(position, { maxDepth: 2 }, history);
    expect(history.hashes()).toEqual([position.hash]);
  });

  it('should be deterministic', () => {
    const position = parseFen('r3k2r/ppp2ppp/2n5/3pp3/3PP3/2N5/PPP2PPP/R3K2R w KQkq - 0 8');
    const search = new ChessSearch();

    const first = search.search(position, { maxDepth: 3 });
    const second = search.search(position, { maxDepth: 3 });

    expect(moveKey(second.bestMove)).toBe(moveKey(first.bestMove));
    expect(second.score).toBe(first.score);
    expect(second.nodes).toBe(first.nodes);
  });
});

// =============================================================================
// Budgets
// =============================================================================

describe('Search budgets', () => {
  it('should stop at the node limit after the first iteration', () => {
    const search = new ChessSearch(new MaterialEvaluator());
    const result = search.search(Position.initial(), { maxDepth: 10, nodeLimit: 50 });

    expect(result.aborted).toBe(true);
    expect(result.depth).toBe(1);
    expect(result.nodes).toBe(50);
    expect(moveKey(result.bestMove)).toBe('b1c3');
  });

  it('should always complete depth 1 even with a tiny node limit', () => {
    const result = new ChessSearch(new MaterialEvaluator()).search(Position.initial(), { maxDepth: 3, nodeLimit: 1 });

    expect(result.depth).toBe(1);
    expect(result.nodes).toBe(21);
  });

  it('should stop at the time limit', () => {
    const result = new ChessSearch().search(Position.initial(), { maxDepth: 63, timeLimit: 50 });

    expect(result.aborted).toBe(true);
    expect(result.depth).toBeGreaterThanOrEqual(1);
    expect(result.depth).toBeLessThan(63);
  });

  it('should not abort when the budget is large enough', () => {
    const result = new ChessSearch().search(Position.initial(), { maxDepth: 2, nodeLimit: 1000000 });
    expect(result.aborted).toBe(false);
    expect(result.depth).toBe(2);
  });
});

// =============================================================================
// Errors
// =============================================================================

describe('Search errors', () => {
  it.each([
    { maxDepth: 0 },
    { maxDepth: 1.5 },
    { maxDepth: 64 },
    { nodeLimit: -5 },
    { timeLimit: 0 },
  ])('should reject %o', config => {
    expect(() => new ChessSearch().search(Position.initial(), config)).toThrow(InvalidConfigError);
  });

  it('should name the offending field', () => {
    try {
      new ChessSearch().search(Position.initial(), { maxDepth: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      expect(err instanceof InvalidConfigError && err.issues[0].startsWith('maxDepth:')).toBe(true);
    }
  });

  it('should refuse to search a stalemate', () => {
    expect(() => new ChessSearch().search(parseFen('7k/5Q2/6K1/8/8/8/8/8 b - - 0 1'))).toThrow(GameOverError);
  });

  it('should refuse to search a position drawn by insufficient material', () => {
    expect(() => new ChessSearch().search(parseFen('8/8/8/8/8/8/8/K6k w - - 0 1'))).toThrow(GameOverError);
  });
});

// =============================================================================
// Logging, Table and Options
// =============================================================================

describe('Search reporting', () => {
  it('should log one line per iteration when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const search = new ChessSearch(new MaterialEvaluator(), { verbose: true });

    search.search(Position.initial(), { maxDepth: 2 });

    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[0][0]).toMatch(/^\[Search\] depth 1 score 0 nodes 21 time \d+ms pv b1c3$/);
  });

  it('should stay quiet by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ChessSearch().search(Position.initial(), { maxDepth: 1 });
    expect(log).not.toHaveBeenCalled();
  });

  it('should fill the transposition table', () => {
    const search = new ChessSearch();
    search.search(Position.initial(), { maxDepth: 3 });

    expect(search.getTTSize()).toBeGreaterThan(0);
    search.clearTT();
    expect(search.getTTSize()).toBe(0);
  });

  it('should report no table use when the table is off', () => {
    const search = new ChessSearch(undefined, { useTranspositionTable: false });
    const result = search.search(Position.initial(), { maxDepth: 3 });

    expect(result.hashFull).toBe(0);
    expect(result.ttHits).toBe(0);
    expect(search.getTTSize()).toBe(0);
  });

  it('should report statistics of the last search', () => {
    const search = new ChessSearch(new MaterialEvaluator());
    const result = search.search(Position.initial(), { maxDepth: 1 });
    const stats = search.getStats();

    expect(stats.nodes).toBe(21);
    expect(stats.depth).toBe(1);
    expect(result.nodes).toBe(21);
  });

  it('should update options', () => {
    const search = new ChessSearch();
    search.setOptions({ ttSizeMB: 1, useKillerMoves: false });

    expect(search.getOptions()).toMatchObject({ ttSizeMB: 1, useKillerMoves: false, useTranspositionTable: true });
  });
});

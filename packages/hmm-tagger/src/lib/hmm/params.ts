import type { RandomSource, Tag, Word } from '../types.js';
import type { Integerizer } from '../integerizer.js';
import { Matrix } from '../matrix.js';
import { ConfigurationError, ConsistencyError } from '../errors.js';
import type { HmmStructure } from './structure.js';
import { emissionAllowed, isRealTag, isRealWord, transitionAllowed } from './structure.js';

export interface HmmParameters {
  /** Transition probabilities p(to | from), K x K. */
  A: Matrix;
  /** Emission probabilities p(word | tag), K x V. */
  B: Matrix;
}

/** Expected counts accumulated by the E step, same shapes as A and B. */
export interface ExpectedCounts {
  A: Matrix;
  B: Matrix;
}

export const ROW_SUM_TOLERANCE = 1e-6;

export function zeroCounts(s: HmmStructure): ExpectedCounts {
  return { A: Matrix.zeros(s.numTags, s.numTags), B: Matrix.zeros(s.numTags, s.numWords) };
}

function permittedTransitions(s: HmmStructure, from: number): number[] {
  const cells: number[] = [];
  for (let to = 0; to < s.numTags; to++) if (transitionAllowed(s, from, to)) cells.push(to);
  return cells;
}

function realWords(s: HmmStructure): number[] {
  const cells: number[] = [];
  for (let w = 0; w < s.numWords; w++) if (isRealWord(s, w)) cells.push(w);
  return cells;
}

/**
 * Writes `weights` (one per cell, non-negative) into row `i` normalized to sum
 * to one. All other cells of the row become zero. A row with no mass becomes
 * uniform over its cells.
 */
function setNormalizedRow(m: Matrix, i: number, cells: number[], weights: ArrayLike<number>): void {
  for (let j = 0; j < m.cols; j++) m.set(i, j, 0);

  let total = 0;
  for (let c = 0; c < cells.length; c++) total += weights[c] ?? 0;

  cells.forEach((j, c) => {
    m.set(i, j, total > 0 ? (weights[c] ?? 0) / total : 1 / cells.length);
  });
}

/** Unnormalized softmax weights; `setNormalizedRow` divides by their sum. */
function expWeights(logits: number[]): number[] {
  const max = Math.max(...logits);
  return logits.map(l => Math.exp(l - max));
}

function randomLogits(n: number, random: RandomSource): number[] {
  return Array.from({ length: n }, () => 0.01 * random());
}

function setSentinelEmissions(s: HmmStructure, B: Matrix): void {
  B.set(s.bosTag, s.bosWord, 1);
  B.set(s.eosTag, s.eosWord, 1);
}

/**
 * Small random parameters that break ties between tags in the unsupervised
 * case. Structural zeros are excluded from the cells before normalizing.
 */
export function initializeParameters(s: HmmStructure, random: RandomSource, unigram: boolean): HmmParameters {
  const B = Matrix.zeros(s.numTags, s.numWords);
  const words = realWords(s);
  for (let t = 0; t < s.numTags; t++) {
    if (!isRealTag(s, t)) continue;
    setNormalizedRow(B, t, words, expWeights(randomLogits(words.length, random)));
  }
  setSentinelEmissions(s, B);

  const A = Matrix.zeros(s.numTags, s.numTags);
  // The start row has the same permitted cells as any real tag, so it can serve as the unigram template.
  const cells = permittedTransitions(s, s.bosTag);
  const shared = unigram ? expWeights(randomLogits(cells.length, random)) : null;
  for (let from = 0; from < s.numTags; from++) {
    if (from === s.eosTag) continue;
    setNormalizedRow(A, from, cells, shared ?? expWeights(randomLogits(cells.length, random)));
  }

  const params = { A, B };
  assertParameterInvariants(s, params, unigram);
  return params;
}

/** Throws when expected counts reached a cell that the E step should never touch. */
export function assertCountInvariants(s: HmmStructure, counts: ExpectedCounts): void {
  for (let from = 0; from < s.numTags; from++) {
    for (let to = 0; to < s.numTags; to++) {
      if (!transitionAllowed(s, from, to) && counts.A.get(from, to) !== 0) {
        throw new ConsistencyError(`expected transition count ${from}->${to} should be zero, got ${counts.A.get(from, to)}`);
      }
    }
  }
  for (let t = 0; t < s.numTags; t++) {
    for (let w = 0; w < s.numWords; w++) {
      const countable = isRealTag(s, t) && isRealWord(s, w);
      if (!countable && counts.B.get(t, w) !== 0) {
        throw new ConsistencyError(`expected emission count tag ${t} word ${w} should be zero, got ${counts.B.get(t, w)}`);
      }
    }
  }
}

/**
 * M step: add-λ smoothing on permitted cells, then row normalization. In
 * unigram mode the transition counts are pooled over source tags into one
 * distribution shared by every row.
 */
export function reestimateParameters(s: HmmStructure, counts: ExpectedCounts, lambda: number, unigram: boolean): HmmParameters {
  if (!(lambda >= 0)) throw new ConfigurationError(`smoothing parameter should be >= 0, got ${lambda}`);
  assertCountInvariants(s, counts);

  const B = Matrix.zeros(s.numTags, s.numWords);
  const words = realWords(s);
  for (let t = 0; t < s.numTags; t++) {
    if (!isRealTag(s, t)) continue;
    setNormalizedRow(B, t, words, words.map(w => counts.B.get(t, w) + lambda));
  }
  setSentinelEmissions(s, B);

  const A = Matrix.zeros(s.numTags, s.numTags);
  const cells = permittedTransitions(s, s.bosTag);
  const pooled = counts.A.columnSums();
  for (let from = 0; from < s.numTags; from++) {
    if (from === s.eosTag) continue;
    const weights = cells.map(to => (unigram ? pooled[to] ?? 0 : counts.A.get(from, to)) + lambda);
    setNormalizedRow(A, from, cells, weights);
  }

  const params = { A, B };
  assertParameterInvariants(s, params, unigram);
  return params;
}

function checkRowSum(m: Matrix, i: number, expected: number, name: string): void {
  const sum = m.rowSum(i);
  if (!(Math.abs(sum - expected) <= ROW_SUM_TOLERANCE)) {
    throw new ConsistencyError(`row ${i} of ${name} sums to ${sum}, expected ${expected}`);
  }
}

/**
 * Every forbidden cell is exactly zero, every permitted cell is a finite
 * non-negative number, and rows sum to one (the end row of A to zero).
 */
export function assertParameterInvariants(s: HmmStructure, params: HmmParameters, unigram: boolean): void {
  const { A, B } = params;
  if (A.rows !== s.numTags || A.cols !== s.numTags) {
    throw new ConsistencyError(`A is ${A.rows}x${A.cols}, expected ${s.numTags}x${s.numTags}`);
  }
  if (B.rows !== s.numTags || B.cols !== s.numWords) {
    throw new ConsistencyError(`B is ${B.rows}x${B.cols}, expected ${s.numTags}x${s.numWords}`);
  }

  for (let from = 0; from < s.numTags; from++) {
    for (let to = 0; to < s.numTags; to++) {
      const p = A.get(from, to);
      if (transitionAllowed(s, from, to) ? !(p >= 0 && p <= 1) : p !== 0) {
        throw new ConsistencyError(`transition ${from}->${to} has invalid probability ${p}`);
      }
    }
    checkRowSum(A, from, from === s.eosTag ? 0 : 1, 'A');
  }

  for (let t = 0; t < s.numTags; t++) {
    for (let w = 0; w < s.numWords; w++) {
      const p = B.get(t, w);
      if (emissionAllowed(s, t, w) ? !(p >= 0 && p <= 1) : p !== 0) {
        throw new ConsistencyError(`emission of word ${w} by tag ${t} has invalid probability ${p}`);
      }
    }
    checkRowSum(B, t, 1, 'B');
  }

  if (unigram) {
    for (let from = 0; from < s.numTags; from++) {
      if (from === s.eosTag || from === s.bosTag) continue;
      for (let to = 0; to < s.numTags; to++) {
        if (A.get(from, to) !== A.get(s.bosTag, to)) {
          throw new ConsistencyError(`unigram transition row ${from} differs from the shared distribution`);
        }
      }
    }
  }
}

/**
 * Owns the A and B matrices of one model. They are replaced wholesale by
 * `reestimate`, never updated cell by cell while an epoch is running.
 */
export class ParameterStore implements HmmParameters {
  A: Matrix;
  B: Matrix;

  constructor(readonly structure: HmmStructure, readonly unigram: boolean, params: HmmParameters) {
    assertParameterInvariants(structure, params, unigram);
    this.A = params.A;
    this.B = params.B;
  }

  static random(structure: HmmStructure, unigram: boolean, random: RandomSource): ParameterStore {
    return new ParameterStore(structure, unigram, initializeParameters(structure, random, unigram));
  }

  initialize(random: RandomSource): void {
    const { A, B } = initializeParameters(this.structure, random, this.unigram);
    this.A = A;
    this.B = B;
  }

  zeroCounts(): ExpectedCounts {
    return zeroCounts(this.structure);
  }

  reestimate(counts: ExpectedCounts, lambda: number): void {
    const { A, B } = reestimateParameters(this.structure, counts, lambda, this.unigram);
    this.A = A;
    this.B = B;
  }

  /** A and B as tab-separated tables with three decimals. */
  format(tagset: Integerizer<Tag>, vocab: Integerizer<Word>): string {
    const table = (m: Matrix, rowName: (i: number) => string, colName: (j: number) => string) => {
      const lines = [['', ...Array.from({ length: m.cols }, (_, j) => colName(j))].join('\t')];
      for (let i = 0; i < m.rows; i++) {
        const cells = Array.from({ length: m.cols }, (_, j) => m.get(i, j).toFixed(3));
        lines.push([rowName(i), ...cells].join('\t'));
      }
      return lines.join('\n');
    };
    const tagName = (i: number) => String(tagset.get(i));
    return [
      'Transition matrix A:',
      table(this.A, tagName, tagName),
      '',
      'Emission matrix B:',
      table(this.B, tagName, j => String(vocab.get(j)))
    ].join('\n');
  }
}

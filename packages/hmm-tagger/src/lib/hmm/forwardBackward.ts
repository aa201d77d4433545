import type { IntegerizedSentence } from '../types.js';
import { Matrix, logSumExp } from '../matrix.js';
import { ConsistencyError, NumericalError } from '../errors.js';
import type { ExpectedCounts, HmmParameters } from './params.js';
import type { HmmStructure } from './structure.js';
import { tagsAt, wordAt } from './structure.js';
import { createLogger } from '../logs.js';

const logger = createLogger('forward-backward');

/**
 * All passes work on log probabilities, so long sentences cannot underflow:
 * log Z stays finite as long as the sentence has nonzero probability.
 */
export interface LogParameters {
  logA: Matrix;
  logB: Matrix;
}

export interface ForwardResult {
  /** log α, (n + 2) x K; -Infinity where a tag is not permitted. */
  logAlpha: Matrix;
  logZ: number;
}

export interface BackwardResult {
  /** log β, (n + 2) x K. */
  logBeta: Matrix;
  logZ: number;
}

export function toLogParameters(params: HmmParameters): LogParameters {
  return { logA: params.A.log(), logB: params.B.log() };
}

export function forwardPass(s: HmmStructure, lp: LogParameters, isent: IntegerizedSentence): ForwardResult {
  const positions = isent.length;
  const logAlpha = Matrix.filled(positions, s.numTags, -Infinity);
  logAlpha.set(0, s.bosTag, 0);

  const terms = new Float64Array(s.numTags);
  let prevTags = tagsAt(s, isent, 0);

  for (let j = 1; j < positions; j++) {
    const word = wordAt(isent, j);
    const tags = tagsAt(s, isent, j);
    for (const t of tags) {
      terms.fill(-Infinity);
      for (const prev of prevTags) {
        terms[prev] = logAlpha.get(j - 1, prev) + lp.logA.get(prev, t);
      }
      logAlpha.set(j, t, logSumExp(terms) + lp.logB.get(t, word));
    }
    prevTags = tags;
  }

  const logZ = logAlpha.get(positions - 1, s.eosTag);
  return { logAlpha, logZ };
}

/**
 * Backward pass. Takes the forward result so that the two log Z values can
 * be compared; they must agree or the lattice computation is broken.
 */
export function backwardPass(s: HmmStructure, lp: LogParameters, isent: IntegerizedSentence, forward: ForwardResult): BackwardResult {
  const positions = isent.length;
  const logBeta = Matrix.filled(positions, s.numTags, -Infinity);
  logBeta.set(positions - 1, s.eosTag, 0);

  const terms = new Float64Array(s.numTags);
  let nextTags = tagsAt(s, isent, positions - 1);

  for (let j = positions - 2; j >= 0; j--) {
    const nextWord = wordAt(isent, j + 1);
    const tags = tagsAt(s, isent, j);
    for (const t of tags) {
      terms.fill(-Infinity);
      for (const next of nextTags) {
        terms[next] = lp.logA.get(t, next) + lp.logB.get(next, nextWord) + logBeta.get(j + 1, next);
      }
      logBeta.set(j, t, logSumExp(terms));
    }
    nextTags = tags;
  }

  const logZ = logBeta.get(0, s.bosTag);
  assertLogZAgreement(forward.logZ, logZ);
  return { logBeta, logZ };
}

export function assertLogZAgreement(forwardLogZ: number, backwardLogZ: number): void {
  if (forwardLogZ === -Infinity && backwardLogZ === -Infinity) return;
  const tolerance = 1e-6 * Math.max(1, Math.abs(forwardLogZ));
  if (!(Math.abs(forwardLogZ - backwardLogZ) <= tolerance)) {
    throw new ConsistencyError(`log Z from forward pass (${forwardLogZ}) and backward pass (${backwardLogZ}) do not match`);
  }
}

/**
 * Adds the posterior transition and emission counts of one sentence, each
 * scaled by `mult`, into `counts`. Sentinel emissions are never counted.
 */
export function accumulateCounts(
  s: HmmStructure,
  lp: LogParameters,
  isent: IntegerizedSentence,
  forward: ForwardResult,
  backward: BackwardResult,
  counts: ExpectedCounts,
  mult = 1
): void {
  const { logAlpha, logZ } = forward;
  const { logBeta } = backward;
  const last = isent.length - 1;

  for (let j = 0; j < last; j++) {
    const nextWord = wordAt(isent, j + 1);
    const tags = tagsAt(s, isent, j);
    const nextTags = tagsAt(s, isent, j + 1);

    for (const t of tags) {
      const a = logAlpha.get(j, t);
      if (a === -Infinity) continue;
      for (const next of nextTags) {
        const logPosterior = a + lp.logA.get(t, next) + lp.logB.get(next, nextWord) + logBeta.get(j + 1, next) - logZ;
        if (logPosterior === -Infinity) continue;
        counts.A.add(t, next, mult * Math.exp(logPosterior));
      }
    }

    if (j + 1 === last) continue;
    for (const next of nextTags) {
      const logPosterior = logAlpha.get(j + 1, next) + logBeta.get(j + 1, next) - logZ;
      if (logPosterior === -Infinity) continue;
      counts.B.add(next, nextWord, mult * Math.exp(logPosterior));
    }
  }
}

/**
 * E step for one sentence: forward, backward, then posterior counts.
 * Returns log Z of the sentence.
 */
export function eStep(
  s: HmmStructure,
  lp: LogParameters,
  isent: IntegerizedSentence,
  counts: ExpectedCounts,
  mult = 1
): number {
  const forward = forwardPass(s, lp, isent);
  if (!Number.isFinite(forward.logZ)) {
    throw new NumericalError(`sentence of length ${isent.length - 2} has log probability ${forward.logZ} under the model`, forward.logZ);
  }
  const backward = backwardPass(s, lp, isent, forward);
  accumulateCounts(s, lp, isent, forward, backward, counts, mult);

  logger.trace({ length: isent.length - 2, logZ: forward.logZ }, 'accumulated sentence');
  return forward.logZ;
}

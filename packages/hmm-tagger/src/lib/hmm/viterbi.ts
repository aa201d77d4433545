import type { IntegerizedSentence } from '../types.js';
import { Matrix } from '../matrix.js';
import { NumericalError } from '../errors.js';
import type { HmmStructure } from './structure.js';
import { tagsAt, wordAt } from './structure.js';
import type { LogParameters } from './forwardBackward.js';

export interface ViterbiResult {
  /** Best tag at positions 1..n, sentinels excluded. */
  tags: number[];
  /** Log probability of the best path. */
  logProbability: number;
}

/**
 * Max-product decoding over the tag lattice in log space, O(n·K²) time and
 * O(n·K) space. Tags on the input sentence are ignored: the decoder sees
 * only words. On ties the lowest previous tag index wins.
 */
export function viterbiDecode(s: HmmStructure, lp: LogParameters, isent: IntegerizedSentence): ViterbiResult {
  const positions = isent.length;
  const score = Matrix.filled(positions, s.numTags, -Infinity);
  const backpointer = new Int32Array(positions * s.numTags).fill(-1);
  score.set(0, s.bosTag, 0);

  let prevTags = tagsAt(s, isent, 0, false);
  for (let j = 1; j < positions; j++) {
    const word = wordAt(isent, j);
    const tags = tagsAt(s, isent, j, false);
    for (const t of tags) {
      const emit = lp.logB.get(t, word);
      if (emit === -Infinity) continue;

      let best = -Infinity;
      let bestPrev = -1;
      for (const prev of prevTags) {
        const candidate = score.get(j - 1, prev) + lp.logA.get(prev, t);
        if (candidate > best) {
          best = candidate;
          bestPrev = prev;
        }
      }
      if (bestPrev < 0) continue;

      score.set(j, t, best + emit);
      backpointer[j * s.numTags + t] = bestPrev;
    }
    prevTags = tags;
  }

  const logProbability = score.get(positions - 1, s.eosTag);
  if (logProbability === -Infinity || Number.isNaN(logProbability)) {
    throw new NumericalError(`no tagging of this ${positions - 2}-word sentence has nonzero probability`, logProbability);
  }

  const tags: number[] = [];
  let current = s.eosTag;
  for (let j = positions - 1; j > 0; j--) {
    const prev = backpointer[j * s.numTags + current] ?? -1;
    if (j < positions - 1) tags.push(current);
    current = prev;
  }
  tags.reverse();

  return { tags, logProbability };
}

import type { TaggedCorpus } from './corpus.js';
import type { HiddenMarkovModel } from './hmm/model.js';
import type { LossFunction } from './hmm/trainer.js';
import { createLogger } from './logs.js';

const logger = createLogger('eval');

export interface TaggingAccuracy {
  correct: number;
  /** Tokens that carry a gold tag. */
  total: number;
  accuracy: number;
}

/**
 * Cross-entropy in nats per token, counting one end-of-sentence event per
 * sentence. Unknown tags are marginalized over.
 */
export function modelCrossEntropy(model: HiddenMarkovModel, corpus: TaggedCorpus): number {
  let logprob = 0;
  let tokens = 0;
  for (const sentence of corpus) {
    logprob += model.logProbability(sentence, corpus);
    tokens += sentence.length + 1;
  }
  return tokens === 0 ? 0 : -logprob / tokens;
}

export function crossEntropyLoss(corpus: TaggedCorpus): LossFunction {
  return model => {
    const loss = modelCrossEntropy(model, corpus);
    logger.info({ crossEntropy: loss, perplexity: Math.exp(loss) }, 'cross-entropy');
    return loss;
  };
}

/** Viterbi tagging accuracy over the tokens of `corpus` that have gold tags. */
export function taggingAccuracy(model: HiddenMarkovModel, corpus: TaggedCorpus): TaggingAccuracy {
  let correct = 0;
  let total = 0;
  for (const gold of corpus) {
    const predicted = model.viterbiTag(gold, corpus);
    gold.forEach((token, i) => {
      if (token.tag === undefined) return;
      total++;
      if (predicted[i]?.tag === token.tag) correct++;
    });
  }
  return { correct, total, accuracy: total === 0 ? 0 : correct / total };
}

export function viterbiErrorRate(corpus: TaggedCorpus): LossFunction {
  return model => {
    const result = taggingAccuracy(model, corpus);
    logger.info(result, 'tagging accuracy');
    return 1 - result.accuracy;
  };
}

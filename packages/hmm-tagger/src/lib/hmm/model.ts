import type { IntegerizedSentence, RandomSource, Sentence, Tag, Word } from '../types.js';
import { Integerizer } from '../integerizer.js';
import type { TaggedCorpus } from '../corpus.js';
import { Matrix } from '../matrix.js';
import { ConfigurationError, VocabularyMismatchError } from '../errors.js';
import { environment } from '../environment.js';
import { createRng } from '../random.js';
import { createLogger } from '../logs.js';
import { structureFor, type HmmStructure } from './structure.js';
import { ParameterStore, type ExpectedCounts, type HmmParameters } from './params.js';
import { eStep, forwardPass, toLogParameters, type LogParameters } from './forwardBackward.js';
import { viterbiDecode } from './viterbi.js';
import { trainModel, type LossFunction, type TrainOptions, type TrainResult } from './trainer.js';
import { readSnapshot, writeSnapshot, type ModelSnapshot } from './persistence.js';

const logger = createLogger('hmm');

export interface HmmOptions {
  /** Fall back to a zeroth-order model in which tag positions are independent. */
  unigram?: boolean;
  /** Random source for the initial parameters; defaults to a generator seeded with `seed`. */
  random?: RandomSource;
  /** Seed used when no random source is given; defaults to HMM_RANDOM_SEED. */
  seed?: number;
}

/**
 * First-order HMM tagger. States are tags and observations are words.
 *
 * The matrices `A` and `B` are replaced, never edited, by training; treat
 * them as read-only.
 */
export class HiddenMarkovModel {
  readonly tagset: Integerizer<Tag>;
  readonly vocab: Integerizer<Word>;
  readonly unigram: boolean;
  readonly structure: HmmStructure;
  readonly params: ParameterStore;

  private logCache: { A: Matrix; B: Matrix; lp: LogParameters } | null = null;

  constructor(tagset: Integerizer<Tag>, vocab: Integerizer<Word>, opts?: HmmOptions, params?: HmmParameters) {
    this.tagset = tagset;
    this.vocab = vocab;
    this.unigram = opts?.unigram ?? false;
    this.structure = structureFor(tagset, vocab);

    if (params) {
      this.params = new ParameterStore(this.structure, this.unigram, params);
    } else {
      const random = opts?.random ?? createRng(opts?.seed ?? environment().HMM_RANDOM_SEED);
      this.params = ParameterStore.random(this.structure, this.unigram, random);
    }
  }

  get A(): Matrix {
    return this.params.A;
  }

  get B(): Matrix {
    return this.params.B;
  }

  /** Log-space copies of A and B, recomputed only after the parameters change. */
  logParameters(): LogParameters {
    const { A, B } = this.params;
    if (this.logCache && this.logCache.A === A && this.logCache.B === B) return this.logCache.lp;
    const lp = toLogParameters(this.params);
    this.logCache = { A, B, lp };
    return lp;
  }

  assertCompatible(corpus: TaggedCorpus): void {
    if (!corpus.tagset.equals(this.tagset) || !corpus.vocab.equals(this.vocab)) {
      throw new VocabularyMismatchError('The corpus that this sentence came from uses a different tagset or vocab');
    }
  }

  /** Integerize a sentence of `corpus`, which must share this model's tag set and vocabulary. */
  integerize(sentence: Sentence, corpus: TaggedCorpus): IntegerizedSentence {
    this.assertCompatible(corpus);
    return corpus.integerizeSentence(sentence);
  }

  /**
   * Log probability of the sentence. Unknown tags are marginalized over;
   * a sentence the model cannot generate gets -Infinity.
   */
  logProbability(sentence: Sentence, corpus: TaggedCorpus): number {
    const isent = this.integerize(sentence, corpus);
    return forwardPass(this.structure, this.logParameters(), isent).logZ;
  }

  /** Adds the sentence's expected counts, scaled by `mult`, to `counts`; returns its log probability. */
  eStep(isent: IntegerizedSentence, counts: ExpectedCounts, mult = 1): number {
    return eStep(this.structure, this.logParameters(), isent, counts, mult);
  }

  /** Most probable tagging of the sentence's words. Any tags on the input are ignored. */
  viterbiTag(sentence: Sentence, corpus: TaggedCorpus): Sentence {
    const isent = this.integerize(sentence, corpus);
    const { tags } = viterbiDecode(this.structure, this.logParameters(), isent);
    return sentence.map(({ word }, i) => {
      const tag = this.tagset.get(tags[i] ?? -1);
      return tag === undefined ? { word } : { word, tag };
    });
  }

  train(corpus: TaggedCorpus, loss: LossFunction, opts?: TrainOptions): TrainResult {
    return trainModel(this, corpus, loss, opts);
  }

  toSnapshot(): ModelSnapshot {
    return {
      format: 'hmm-tagger/1',
      tagset: this.tagset.toArray(),
      vocab: this.vocab.toArray(),
      unigram: this.unigram,
      A: this.A.toRows(),
      B: this.B.toRows()
    };
  }

  static fromSnapshot(snapshot: ModelSnapshot): HiddenMarkovModel {
    const tagset = new Integerizer(snapshot.tagset);
    const vocab = new Integerizer(snapshot.vocab);
    if (tagset.size !== snapshot.tagset.length || vocab.size !== snapshot.vocab.length) {
      throw new ConfigurationError('saved tag set or vocabulary contains duplicates');
    }
    if (snapshot.A.length !== tagset.size || snapshot.B.length !== tagset.size) {
      throw new ConfigurationError(`saved matrices should have ${tagset.size} rows`);
    }
    const A = Matrix.fromRows(snapshot.A, tagset.size);
    const B = Matrix.fromRows(snapshot.B, vocab.size);
    return new HiddenMarkovModel(tagset, vocab, { unigram: snapshot.unigram }, { A, B });
  }

  save(file: string): void {
    logger.info({ file }, 'saving model');
    writeSnapshot(file, this.toSnapshot());
    logger.info({ file }, 'saved model');
  }

  static load(file: string): HiddenMarkovModel {
    const model = HiddenMarkovModel.fromSnapshot(readSnapshot(file));
    logger.info({ file, tags: model.tagset.size, words: model.vocab.size }, 'loaded model');
    return model;
  }
}

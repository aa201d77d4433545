// Curated public API
export type { Word, Tag, TaggedWord, Sentence, IntegerizedToken, IntegerizedSentence, RandomSource } from './lib/types.js';
export { BOS_TAG, EOS_TAG, BOS_WORD, EOS_WORD, OOV_WORD } from './lib/types.js';
export { Integerizer } from './lib/integerizer.js';
export { TaggedCorpus, parseSentence, parseToken, formatSentence } from './lib/corpus.js';
export type { CorpusOptions } from './lib/corpus.js';
export { Matrix, logSumExp } from './lib/matrix.js';
export { createRng } from './lib/random.js';
export { HmmError, ConfigurationError, VocabularyMismatchError, ConsistencyError, NumericalError } from './lib/errors.js';
export { HiddenMarkovModel } from './lib/hmm/model.js';
export type { HmmOptions } from './lib/hmm/model.js';
export { structureFor, transitionAllowed, emissionAllowed } from './lib/hmm/structure.js';
export type { HmmStructure } from './lib/hmm/structure.js';
export { ParameterStore, initializeParameters, reestimateParameters, assertParameterInvariants, zeroCounts } from './lib/hmm/params.js';
export type { HmmParameters, ExpectedCounts } from './lib/hmm/params.js';
export { forwardPass, backwardPass, accumulateCounts, eStep, toLogParameters } from './lib/hmm/forwardBackward.js';
export type { ForwardResult, BackwardResult, LogParameters } from './lib/hmm/forwardBackward.js';
export { viterbiDecode } from './lib/hmm/viterbi.js';
export type { ViterbiResult } from './lib/hmm/viterbi.js';
export { EmTrainer, trainModel, trainOptionsSchema } from './lib/hmm/trainer.js';
export type { LossFunction, TrainOptions, TrainResult, TrainerState, EpochReport } from './lib/hmm/trainer.js';
export { modelSnapshotSchema, parseSnapshot } from './lib/hmm/persistence.js';
export type { ModelSnapshot } from './lib/hmm/persistence.js';
export { crossEntropyLoss, viterbiErrorRate, taggingAccuracy, modelCrossEntropy } from './lib/eval.js';
export type { TaggingAccuracy } from './lib/eval.js';

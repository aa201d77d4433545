import type { IntegerizedSentence, Tag, Word } from '../types.js';
import { BOS_TAG, BOS_WORD, EOS_TAG, EOS_WORD } from '../types.js';
import type { Integerizer } from '../integerizer.js';
import { ConfigurationError, ConsistencyError } from '../errors.js';

/**
 * Shape of a model and the positions of its sentinels. All structural zeros
 * of A and B are derived from this through the predicates below.
 */
export interface HmmStructure {
  /** K, including both sentinel tags. */
  numTags: number;
  /** V, including both sentinel words. */
  numWords: number;
  bosTag: number;
  eosTag: number;
  bosWord: number;
  eosWord: number;
}

export function structureFor(tagset: Integerizer<Tag>, vocab: Integerizer<Word>): HmmStructure {
  const k = tagset.size;
  const v = vocab.size;

  if (k < 3 || tagset.get(k - 2) !== EOS_TAG || tagset.get(k - 1) !== BOS_TAG) {
    throw new ConfigurationError(`final two tags should be ${EOS_TAG}, ${BOS_TAG} after at least one real tag`);
  }
  if (v < 3 || vocab.get(v - 2) !== EOS_WORD || vocab.get(v - 1) !== BOS_WORD) {
    throw new ConfigurationError(`final two words should be ${EOS_WORD}, ${BOS_WORD} after at least one real word`);
  }

  return { numTags: k, numWords: v, eosTag: k - 2, bosTag: k - 1, eosWord: v - 2, bosWord: v - 1 };
}

export function isRealTag(s: HmmStructure, tag: number): boolean {
  return tag !== s.bosTag && tag !== s.eosTag;
}

export function isRealWord(s: HmmStructure, word: number): boolean {
  return word !== s.bosWord && word !== s.eosWord;
}

/** Nothing enters the start tag and nothing leaves the end tag. */
export function transitionAllowed(s: HmmStructure, from: number, to: number): boolean {
  return from !== s.eosTag && to !== s.bosTag;
}

/** Sentinel tags emit only their own sentinel word; real tags emit only real words. */
export function emissionAllowed(s: HmmStructure, tag: number, word: number): boolean {
  if (tag === s.bosTag) return word === s.bosWord;
  if (tag === s.eosTag) return word === s.eosWord;
  return isRealWord(s, word);
}

export function realTags(s: HmmStructure): number[] {
  const tags: number[] = [];
  for (let t = 0; t < s.numTags; t++) if (isRealTag(s, t)) tags.push(t);
  return tags;
}

/**
 * Tags that may occupy position `j` of an integerized sentence: the sentinel
 * at either end, the supervised tag where one is given, otherwise every real tag.
 */
/** Word index at position `j` of an integerized sentence. */
export function wordAt(isent: IntegerizedSentence, j: number): number {
  const token = isent[j];
  if (!token) throw new ConsistencyError(`position ${j} is outside a sentence of length ${isent.length}`);
  return token.word;
}

export function tagsAt(s: HmmStructure, isent: IntegerizedSentence, j: number, observeTags = true): number[] {
  if (j === 0) return [s.bosTag];
  if (j === isent.length - 1) return [s.eosTag];
  const tag = observeTags ? isent[j]?.tag ?? null : null;
  return tag === null ? realTags(s) : [tag];
}

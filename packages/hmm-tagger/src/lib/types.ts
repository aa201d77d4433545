export type Word = string;
export type Tag = string;

// Sentinels. They sit at the end of every tag set and vocabulary: end first, start last.
export const EOS_TAG: Tag = '_EOS_TAG_';
export const BOS_TAG: Tag = '_BOS_TAG_';
export const EOS_WORD: Word = '_EOS_WORD_';
export const BOS_WORD: Word = '_BOS_WORD_';

/** Stand-in for any word that is not in the vocabulary. */
export const OOV_WORD: Word = '_OOV_';

/**
 * A token of a sentence. An absent tag is unknown and gets marginalized over;
 * a present tag is a fixed, supervised observation.
 */
export interface TaggedWord {
  word: Word;
  tag?: Tag;
}

/** A sentence without sentinels. */
export type Sentence = TaggedWord[];

export interface IntegerizedToken {
  word: number;
  tag: number | null;
}

/**
 * An integerized sentence of length n + 2: position 0 is the start sentinel,
 * position n + 1 the end sentinel, both tagged.
 */
export type IntegerizedSentence = IntegerizedToken[];

/** Returns uniformly distributed numbers in [0, 1). */
export type RandomSource = () => number;

import fs from 'fs/promises';
import type { IntegerizedSentence, Sentence, Tag, TaggedWord, Word } from './types.js';
import { BOS_TAG, BOS_WORD, EOS_TAG, EOS_WORD, OOV_WORD } from './types.js';
import { Integerizer } from './integerizer.js';
import { VocabularyMismatchError } from './errors.js';
import { structureFor, type HmmStructure } from './hmm/structure.js';
import { createLogger } from './logs.js';

const logger = createLogger('corpus');

export interface CorpusOptions {
  /** Share the tag set of another corpus or model instead of building one. */
  tagset?: Integerizer<Tag>;
  /** Share the vocabulary of another corpus or model instead of building one. */
  vocab?: Integerizer<Word>;
  /** Words seen fewer times than this are left out of a built vocabulary and read as OOV. */
  oovThreshold?: number;
}

/** Parses `word/tag` (split at the last slash) or a bare, untagged `word`. */
export function parseToken(token: string): TaggedWord {
  const slash = token.lastIndexOf('/');
  if (slash <= 0 || slash === token.length - 1) return { word: token };
  return { word: token.slice(0, slash), tag: token.slice(slash + 1) };
}

export function parseSentence(line: string): Sentence {
  return line.trim().split(/\s+/).filter(Boolean).map(parseToken);
}

export function formatSentence(sentence: Sentence): string {
  return sentence.map(({ word, tag }) => (tag === undefined ? word : `${word}/${tag}`)).join(' ');
}

function buildTagset(sentences: Sentence[]): Integerizer<Tag> {
  const tagset = new Integerizer<Tag>();
  for (const sentence of sentences) {
    for (const { tag } of sentence) if (tag !== undefined) tagset.add(tag);
  }
  tagset.add(EOS_TAG);
  tagset.add(BOS_TAG);
  return tagset;
}

function buildVocab(sentences: Sentence[], threshold: number): Integerizer<Word> {
  const counts = new Map<Word, number>();
  for (const sentence of sentences) {
    for (const { word } of sentence) counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  const vocab = new Integerizer<Word>();
  for (const [word, count] of counts) {
    if (count >= threshold) vocab.add(word);
  }
  vocab.add(OOV_WORD);
  vocab.add(EOS_WORD);
  vocab.add(BOS_WORD);
  return vocab;
}

/**
 * A finite, restartable collection of sentences together with the tag set
 * and vocabulary used to integerize them.
 */
export class TaggedCorpus implements Iterable<Sentence> {
  readonly sentences: Sentence[];
  readonly tagset: Integerizer<Tag>;
  readonly vocab: Integerizer<Word>;
  private readonly structure: HmmStructure;

  constructor(sentences: Sentence[], opts?: CorpusOptions) {
    this.sentences = sentences;
    this.tagset = opts?.tagset ?? buildTagset(sentences);
    this.vocab = opts?.vocab ?? buildVocab(sentences, opts?.oovThreshold ?? 1);
    this.structure = structureFor(this.tagset, this.vocab);
  }

  /** One sentence per non-blank line. */
  static fromText(text: string, opts?: CorpusOptions): TaggedCorpus {
    const sentences = text
      .replace(/\r\n/g, '\n')
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map(parseSentence);
    return new TaggedCorpus(sentences, opts);
  }

  static async fromFile(file: string, opts?: CorpusOptions): Promise<TaggedCorpus> {
    const text = await fs.readFile(file, 'utf8');
    const corpus = TaggedCorpus.fromText(text, opts);
    logger.info({ file, sentences: corpus.length, tags: corpus.tagset.size, words: corpus.vocab.size }, 'read corpus');
    return corpus;
  }

  get length(): number {
    return this.sentences.length;
  }

  /** Number of tokens, sentinels not counted. */
  numTokens(): number {
    return this.sentences.reduce((n, s) => n + s.length, 0);
  }

  private wordIndex(word: Word): number {
    const index = this.vocab.indexOf(word) ?? this.vocab.indexOf(OOV_WORD);
    if (index === undefined) {
      throw new VocabularyMismatchError(`word '${word}' is not in the vocabulary and there is no ${OOV_WORD} entry`);
    }
    if (index === this.structure.bosWord || index === this.structure.eosWord) {
      throw new VocabularyMismatchError(`sentence contains the reserved word '${word}'`);
    }
    return index;
  }

  private tagIndex(tag: Tag | undefined): number | null {
    if (tag === undefined) return null;
    const index = this.tagset.indexOf(tag);
    if (index === undefined) throw new VocabularyMismatchError(`tag '${tag}' is not in the tag set`);
    if (index === this.structure.bosTag || index === this.structure.eosTag) {
      throw new VocabularyMismatchError(`sentence contains the reserved tag '${tag}'`);
    }
    return index;
  }

  /** Integer form with the start and end sentinels added. */
  integerizeSentence(sentence: Sentence): IntegerizedSentence {
    const s = this.structure;
    return [
      { word: s.bosWord, tag: s.bosTag },
      ...sentence.map(({ word, tag }) => ({ word: this.wordIndex(word), tag: this.tagIndex(tag) })),
      { word: s.eosWord, tag: s.eosTag }
    ];
  }

  [Symbol.iterator](): Iterator<Sentence> {
    return this.sentences[Symbol.iterator]();
  }
}

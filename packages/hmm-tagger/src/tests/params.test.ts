import { test, expect } from 'vitest'
import { Integerizer } from '../lib/integerizer.js'
import { Matrix } from '../lib/matrix.js'
import { structureFor, transitionAllowed, emissionAllowed, isRealTag, isRealWord, wordAt } from '../lib/hmm/structure.js'
import type { HmmStructure } from '../lib/hmm/structure.js'
import {
  ParameterStore,
  initializeParameters,
  reestimateParameters,
  zeroCounts,
  ROW_SUM_TOLERANCE
} from '../lib/hmm/params.js'
import type { HmmParameters } from '../lib/hmm/params.js'
import { createRng } from '../lib/random.js'
import { ConfigurationError, ConsistencyError } from '../lib/errors.js'
import { BOS_TAG, BOS_WORD, EOS_TAG, EOS_WORD } from '../lib/types.js'
import { iceCreamModel, iceCreamTagset, iceCreamVocab, H, C, EOS, BOS } from './test-helpers.js'

const structure = structureFor(
  new Integerizer(['N', 'V', 'D', EOS_TAG, BOS_TAG]),
  new Integerizer(['the', 'dog', 'barks', 'runs', EOS_WORD, BOS_WORD])
)

function expectValidParameters(s: HmmStructure, { A, B }: HmmParameters) {
  for (let i = 0; i < s.numTags; i++) {
    for (let j = 0; j < s.numTags; j++) {
      if (!transitionAllowed(s, i, j)) expect(A.get(i, j)).toBe(0)
    }
    if (i !== s.eosTag) expect(Math.abs(A.rowSum(i) - 1)).toBeLessThan(ROW_SUM_TOLERANCE)
    for (let w = 0; w < s.numWords; w++) {
      if (!emissionAllowed(s, i, w)) expect(B.get(i, w)).toBe(0)
    }
    expect(Math.abs(B.rowSum(i) - 1)).toBeLessThan(ROW_SUM_TOLERANCE)
  }
}

test('structureFor places the sentinels at the end', () => {
  expect(structure).toEqual({ numTags: 5, numWords: 6, eosTag: 3, bosTag: 4, eosWord: 4, bosWord: 5 })
})

test('structureFor rejects a tag set without sentinels', () => {
  expect(() => structureFor(new Integerizer(['N', 'V']), iceCreamVocab())).toThrow(ConfigurationError)
  expect(() => structureFor(new Integerizer([EOS_TAG, BOS_TAG]), iceCreamVocab())).toThrow(ConfigurationError)
  expect(() => structureFor(iceCreamTagset(), new Integerizer(['1', BOS_WORD, EOS_WORD]))).toThrow(ConfigurationError)
})

test('random initialization respects structural zeros and normalization', () => {
  for (const unigram of [false, true]) {
    const params = initializeParameters(structure, createRng(42), unigram)
    expectValidParameters(structure, params)
    expect(params.B.get(structure.bosTag, structure.bosWord)).toBe(1)
    expect(params.B.get(structure.eosTag, structure.eosWord)).toBe(1)
  }
})

test('unigram initialization shares one transition row', () => {
  const { A } = initializeParameters(structure, createRng(5), true)
  const shared = A.toRows()[structure.bosTag]
  for (let i = 0; i < structure.numTags; i++) {
    if (i === structure.eosTag) continue
    expect(A.toRows()[i]).toEqual(shared)
  }
})

test('initialization is reproducible for a seed', () => {
  const a = initializeParameters(structure, createRng(9), false)
  const b = initializeParameters(structure, createRng(9), false)
  expect(a.A.toRows()).toEqual(b.A.toRows())
  expect(a.B.toRows()).toEqual(b.B.toRows())
})

function randomCounts(s: HmmStructure, seed: number) {
  const r = createRng(seed)
  const counts = zeroCounts(s)
  for (let i = 0; i < s.numTags; i++) {
    for (let j = 0; j < s.numTags; j++) {
      if (transitionAllowed(s, i, j)) counts.A.set(i, j, 5 * r())
    }
    for (let w = 0; w < s.numWords; w++) {
      if (isRealTag(s, i) && isRealWord(s, w)) counts.B.set(i, w, 5 * r())
    }
  }
  return counts
}

test('re-estimation with λ=0 equals direct row normalization of the counts', () => {
  const counts = randomCounts(structure, 11)
  const first = reestimateParameters(structure, counts, 0, false)
  const second = reestimateParameters(structure, counts, 0, false)

  for (let i = 0; i < structure.numTags; i++) {
    if (i === structure.eosTag) continue
    const total = counts.A.rowSum(i)
    for (let j = 0; j < structure.numTags; j++) {
      expect(first.A.get(i, j)).toBeCloseTo(counts.A.get(i, j) / total, 12)
    }
  }
  for (const t of [0, 1, 2]) {
    const total = counts.B.rowSum(t)
    for (let w = 0; w < structure.numWords; w++) {
      expect(first.B.get(t, w)).toBeCloseTo(counts.B.get(t, w) / total, 12)
    }
  }

  expect(second.A.toRows()).toEqual(first.A.toRows())
  expect(second.B.toRows()).toEqual(first.B.toRows())
  expectValidParameters(structure, first)
})

test('add-λ smoothing adds λ to every permitted cell', () => {
  const { model } = iceCreamModel()
  const s = model.structure
  const counts = zeroCounts(s)
  counts.B.set(H, 0, 2)
  counts.B.set(H, 2, 1)
  counts.A.set(BOS, H, 1)

  const { A, B } = reestimateParameters(s, counts, 1, false)
  expect(B.get(H, 0)).toBeCloseTo(3 / 6, 12)
  expect(B.get(H, 1)).toBeCloseTo(1 / 6, 12)
  expect(B.get(H, 2)).toBeCloseTo(2 / 6, 12)
  expect(B.get(H, 3)).toBe(0)
  // BOS row: H, C and EOS are permitted
  expect(A.get(BOS, H)).toBeCloseTo(2 / 4, 12)
  expect(A.get(BOS, C)).toBeCloseTo(1 / 4, 12)
  expect(A.get(BOS, EOS)).toBeCloseTo(1 / 4, 12)
  expect(A.get(BOS, BOS)).toBe(0)
})

test('a row without counts becomes uniform over its permitted cells', () => {
  const { A, B } = reestimateParameters(structure, zeroCounts(structure), 0, false)
  expect(B.get(0, 0)).toBeCloseTo(1 / 4, 12)
  expect(B.get(0, structure.eosWord)).toBe(0)
  expect(A.get(0, 0)).toBeCloseTo(1 / 4, 12)
  expect(A.get(structure.eosTag, 0)).toBe(0)
})

test('unigram re-estimation pools transition counts over source tags', () => {
  const { model } = iceCreamModel()
  const s = model.structure
  const counts = zeroCounts(s)
  counts.A.set(BOS, H, 1)
  counts.A.set(H, H, 1)
  counts.A.set(C, H, 1)
  counts.A.set(BOS, C, 1)
  counts.A.set(C, C, 1)
  counts.A.set(H, EOS, 1)
  counts.A.set(C, EOS, 1)

  const { A } = reestimateParameters(s, counts, 0, true)
  for (const from of [H, C, BOS]) {
    expect(A.get(from, H)).toBeCloseTo(3 / 7, 12)
    expect(A.get(from, C)).toBeCloseTo(2 / 7, 12)
    expect(A.get(from, EOS)).toBeCloseTo(2 / 7, 12)
  }
  expect(A.rowSum(EOS)).toBe(0)
})

test('counts in forbidden cells fail loudly', () => {
  const { model } = iceCreamModel()
  const s = model.structure

  const intoStart = zeroCounts(s)
  intoStart.A.set(H, BOS, 0.5)
  expect(() => reestimateParameters(s, intoStart, 0, false)).toThrow(ConsistencyError)

  const outOfEnd = zeroCounts(s)
  outOfEnd.A.set(EOS, H, 0.5)
  expect(() => reestimateParameters(s, outOfEnd, 0, false)).toThrow(ConsistencyError)

  const sentinelEmission = zeroCounts(s)
  sentinelEmission.B.set(EOS, s.eosWord, 1)
  expect(() => reestimateParameters(s, sentinelEmission, 0, false)).toThrow(ConsistencyError)
})

test('negative smoothing is a configuration error', () => {
  expect(() => reestimateParameters(structure, zeroCounts(structure), -1, false)).toThrow(ConfigurationError)
})

test('ParameterStore rejects parameters that break the invariants', () => {
  const { model } = iceCreamModel()
  const A = model.A.clone()
  A.set(H, H, 0.7)
  expect(() => new ParameterStore(model.structure, false, { A, B: model.B })).toThrow(ConsistencyError)

  const B = model.B.clone()
  B.set(H, model.structure.bosWord, 0.1)
  B.set(H, 2, 0.6)
  expect(() => new ParameterStore(model.structure, false, { A: model.A, B })).toThrow(ConsistencyError)
})

test('ParameterStore.reestimate replaces the matrices', () => {
  const store = ParameterStore.random(structure, false, createRng(1))
  const before = store.A
  store.reestimate(randomCounts(structure, 2), 0.5)
  expect(store.A).not.toBe(before)
  expectValidParameters(structure, store)
})

test('ParameterStore.initialize draws fresh parameters', () => {
  const store = ParameterStore.random(structure, true, createRng(1))
  const { A, B } = store
  store.initialize(createRng(2))
  expect(store.A).not.toBe(A)
  expect(store.B).not.toBe(B)
  expect(store.A.toRows()).not.toEqual(A.toRows())
  expectValidParameters(structure, store)
  expect(store.A.toRows()[0]).toEqual(store.A.toRows()[structure.bosTag])
})

test('format prints both tables', () => {
  const { model } = iceCreamModel()
  const text = model.params.format(model.tagset, model.vocab)
  const lines = text.split('\n')
  expect(lines[0]).toBe('Transition matrix A:')
  expect(lines[1]).toBe(`\tH\tC\t${EOS_TAG}\t${BOS_TAG}`)
  expect(lines[2]).toBe('H\t0.800\t0.100\t0.100\t0.000')
  expect(lines).toContain('C\t0.700\t0.200\t0.100\t0.000\t0.000')
})

test('Matrix.fromRows rejects ragged rows', () => {
  expect(() => Matrix.fromRows([[1, 2], [3]])).toThrow(ConfigurationError)
})

test('Matrix cells outside its shape are an error', () => {
  const m = Matrix.zeros(2, 3)
  expect(() => m.get(2, 0)).toThrow(ConsistencyError)
  expect(() => m.get(0, 3)).toThrow(ConsistencyError)
  expect(() => m.set(-1, 0, 1)).toThrow(ConsistencyError)
  expect(() => m.add(0, -1, 1)).toThrow(ConsistencyError)
  m.add(1, 2, 0.5)
  expect(m.get(1, 2)).toBe(0.5)
})

test('wordAt rejects a position outside the sentence', () => {
  const isent = [{ word: structure.bosWord, tag: structure.bosTag }, { word: structure.eosWord, tag: structure.eosTag }]
  expect(wordAt(isent, 1)).toBe(structure.eosWord)
  expect(() => wordAt(isent, 2)).toThrow(ConsistencyError)
})

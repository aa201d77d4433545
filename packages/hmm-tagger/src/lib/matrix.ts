import { ConfigurationError, ConsistencyError } from './errors.js'

/**
 * Dense row-major matrix of doubles. Every operation names its axis
 * explicitly; there is no broadcasting.
 */
export class Matrix {
  readonly rows: number
  readonly cols: number
  readonly data: Float64Array

  constructor(rows: number, cols: number, data?: Float64Array) {
    if (data && data.length !== rows * cols) {
      throw new ConfigurationError(`Matrix data has ${data.length} cells, expected ${rows}x${cols}`)
    }
    this.rows = rows
    this.cols = cols
    this.data = data ?? new Float64Array(rows * cols)
  }

  static zeros(rows: number, cols: number): Matrix {
    return new Matrix(rows, cols)
  }

  static filled(rows: number, cols: number, value: number): Matrix {
    const m = new Matrix(rows, cols)
    m.data.fill(value)
    return m
  }

  static fromRows(values: number[][], cols?: number): Matrix {
    const width = cols ?? values[0]?.length ?? 0
    const m = new Matrix(values.length, width)
    values.forEach((row, i) => {
      if (row.length !== width) {
        throw new ConfigurationError(`Row ${i} has ${row.length} columns, expected ${width}`)
      }
      row.forEach((v, j) => m.set(i, j, v))
    })
    return m
  }

  private offset(i: number, j: number): number {
    if (!(i >= 0 && i < this.rows && j >= 0 && j < this.cols)) {
      throw new ConsistencyError(`cell (${i}, ${j}) is outside a ${this.rows}x${this.cols} matrix`)
    }
    return i * this.cols + j
  }

  get(i: number, j: number): number {
    const value = this.data[this.offset(i, j)]
    if (value === undefined) throw new ConsistencyError(`cell (${i}, ${j}) has no value`)
    return value
  }

  set(i: number, j: number, value: number): void {
    this.data[this.offset(i, j)] = value
  }

  add(i: number, j: number, value: number): void {
    const k = this.offset(i, j)
    this.data[k] = (this.data[k] ?? 0) + value
  }

  rowSum(i: number): number {
    let sum = 0
    for (let j = 0; j < this.cols; j++) sum += this.get(i, j)
    return sum
  }

  /** Sum over rows, one value per column. */
  columnSums(): Float64Array {
    const sums = new Float64Array(this.cols)
    for (let i = 0; i < this.rows; i++) {
      for (let j = 0; j < this.cols; j++) sums[j] = (sums[j] ?? 0) + this.get(i, j)
    }
    return sums
  }

  /** Elementwise natural log; zero maps to -Infinity. */
  log(): Matrix {
    return new Matrix(this.rows, this.cols, this.data.map(Math.log))
  }

  clone(): Matrix {
    return new Matrix(this.rows, this.cols, this.data.slice())
  }

  toRows(): number[][] {
    const out: number[][] = []
    for (let i = 0; i < this.rows; i++) {
      out.push(Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols)))
    }
    return out
  }
}

/** log(Σ exp(v)) without overflow; -Infinity for an empty or all -Infinity input. */
export function logSumExp(values: ArrayLike<number>): number {
  let max = -Infinity
  for (let i = 0; i < values.length; i++) {
    const v = values[i] ?? -Infinity
    if (v > max) max = v
  }
  if (max === -Infinity) return -Infinity
  if (max === Infinity) return Infinity

  let sum = 0
  for (let i = 0; i < values.length; i++) {
    sum += Math.exp((values[i] ?? -Infinity) - max)
  }
  return max + Math.log(sum)
}

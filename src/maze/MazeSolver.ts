import type { Cell, SolveResult, StopPolicy, VisitEvent } from '../types'
import { MazeError, formatCell } from './errors'
import { sameCell, type GridView } from './Grid'

export interface SearchOptions {
  /**
   * `'discovered'` ends the search as soon as the end cell is marked visited.
   * `'dequeued'` keeps going until the end cell is taken off the queue, which
   * exposes a few more visits but yields the same path.
   */
  stopWhen?: StopPolicy
}

/**
 * Breadth-first search over the passage graph, exposed as a pull-based,
 * forward-only sequence of visit events. Iterating a second time continues
 * where the first left off; nothing is replayed.
 *
 * The first event is always the start cell with a `null` predecessor. Each
 * later event is a cell marked visited for the first time, in queue order,
 * with neighbors taken north, south, east, west.
 *
 * When the queue runs dry before the end cell is reached, pulling throws a
 * `MazeError` of kind `Unreachable`.
 */
export class MazeSearch implements Iterable<VisitEvent> {
  readonly start: Cell
  readonly end: Cell
  readonly stopWhen: StopPolicy

  private readonly records = new Map<number, VisitEvent>()
  private readonly visits: VisitEvent[] = []
  private readonly queue: Cell[] = []
  private head = 0
  private reached = false
  private done = false
  private readonly generator: Generator<VisitEvent, void, undefined>

  constructor(private readonly grid: GridView, start: Cell, end: Cell, options: SearchOptions = {}) {
    for (const cell of [start, end]) {
      if (!grid.contains(cell)) {
        throw new MazeError(
          'InvalidCell',
          `Cell ${formatCell(cell)} is outside the ${grid.width}x${grid.height} grid`
        )
      }
    }
    this.start = { row: start.row, col: start.col }
    this.end = { row: end.row, col: end.col }
    this.stopWhen = options.stopWhen ?? 'discovered'
    this.generator = this.run()
  }

  [Symbol.iterator](): Iterator<VisitEvent> {
    return this.generator
  }

  next(): IteratorResult<VisitEvent, void> {
    return this.generator.next()
  }

  // Pulls one event, or returns null once the search has finished
  step(): VisitEvent | null {
    const result = this.generator.next()
    return result.done ? null : result.value
  }

  // True once no more events will be produced, including after an early close
  get finished(): boolean {
    return this.done
  }

  get reachedEnd(): boolean {
    return this.reached
  }

  get visitCount(): number {
    return this.visits.length
  }

  visitedCells(): Cell[] {
    return this.visits.map((visit) => visit.cell)
  }

  frontier(): Cell[] {
    return this.queue.slice(this.head)
  }

  path(): Cell[] {
    let record = this.records.get(this.grid.indexOf(this.end))
    if (!record) {
      throw new MazeError('NoPath', `No path from ${formatCell(this.start)} to ${formatCell(this.end)}`)
    }

    const path: Cell[] = []
    while (record) {
      path.push(record.cell)
      if (record.predecessor === null) break
      record = this.records.get(this.grid.indexOf(record.predecessor))
    }
    if (!record) {
      throw new MazeError('NoPath', `Predecessor chain to ${formatCell(this.end)} is broken`)
    }
    return path.reverse()
  }

  private visit(cell: Cell, predecessor: Cell | null): VisitEvent {
    const depth = predecessor === null
      ? 0
      : (this.records.get(this.grid.indexOf(predecessor))?.depth ?? 0) + 1
    const event: VisitEvent = { cell, predecessor, depth, order: this.visits.length }
    this.records.set(this.grid.indexOf(cell), event)
    this.visits.push(event)
    this.queue.push(cell)
    if (sameCell(cell, this.end)) this.reached = true
    return event
  }

  private *run(): Generator<VisitEvent, void, undefined> {
    try {
      yield this.visit(this.start, null)
      if (this.reached && this.stopWhen === 'discovered') return

      while (this.head < this.queue.length) {
        const current = this.queue[this.head++]
        if (this.stopWhen === 'dequeued' && sameCell(current, this.end)) return

        for (const next of this.grid.passages(current)) {
          if (this.records.has(this.grid.indexOf(next))) continue
          yield this.visit(next, current)
          if (this.reached && this.stopWhen === 'discovered') return
        }
      }

      throw new MazeError(
        'Unreachable',
        `Cell ${formatCell(this.end)} cannot be reached from ${formatCell(this.start)}`
      )
    } finally {
      this.done = true
    }
  }
}

export function searchMaze(grid: GridView, start: Cell, end: Cell, options: SearchOptions = {}): MazeSearch {
  return new MazeSearch(grid, start, end, options)
}

export function solveMaze(grid: GridView, start: Cell, end: Cell, options: SearchOptions = {}): SolveResult {
  const search = new MazeSearch(grid, start, end, options)
  const visits = [...search]
  return { path: search.path(), visits }
}

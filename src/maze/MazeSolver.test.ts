import { describe, it, expect, vi, afterEach } from 'vitest'
import type { Cell, VisitEvent } from '../types'
import { Grid } from './Grid'
import { generateMaze } from './MazeGenerator'
import { MazeSearch, searchMaze, solveMaze } from './MazeSolver'
import { MazeError } from './errors'
import { countPassages } from './analysis'

const cell = (row: number, col: number): Cell => ({ row, col })

// Grid with every interior wall removed
function openGrid(width: number, height: number): Grid {
  const grid = new Grid(width, height)
  for (const c of grid.cells()) {
    if (c.col + 1 < width) grid.removeWall(c, cell(c.row, c.col + 1))
    if (c.row + 1 < height) grid.removeWall(c, cell(c.row + 1, c.col))
  }
  return grid
}

// Independent distance check: plain queue over hasWall, no shared code with the solver
function referenceDistance(grid: Grid, from: Cell, to: Cell): number {
  const key = (c: Cell) => `${c.row},${c.col}`
  const dist = new Map<string, number>([[key(from), 0]])
  const queue: Cell[] = [from]
  const offsets = [[1, 0], [-1, 0], [0, 1], [0, -1]]
  while (queue.length > 0) {
    const current = queue.shift()
    if (!current) break
    const d = dist.get(key(current)) ?? 0
    if (current.row === to.row && current.col === to.col) return d
    for (const [dr, dc] of offsets) {
      const next = cell(current.row + dr, current.col + dc)
      if (next.row < 0 || next.col < 0 || next.row >= grid.height || next.col >= grid.width) continue
      if (dist.has(key(next)) || grid.hasWall(current, next)) continue
      dist.set(key(next), d + 1)
      queue.push(next)
    }
  }
  return Infinity
}

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    return err instanceof MazeError ? err.kind : 'other'
  }
  return undefined
}

describe('solveMaze', () => {
  it('finds shortest paths through generated mazes', () => {
    for (let seed = 1; seed <= 8; seed++) {
      const { grid } = generateMaze(11, 7, { seed })
      const pairs: [Cell, Cell][] = [
        [cell(0, 0), cell(6, 10)],
        [cell(3, 5), cell(0, 10)],
        [cell(6, 0), cell(2, 2)],
      ]
      for (const [start, end] of pairs) {
        const { path } = solveMaze(grid, start, end)
        expect(path[0]).toEqual(start)
        expect(path[path.length - 1]).toEqual(end)
        expect(path.length - 1).toBe(referenceDistance(grid, start, end))
        for (let i = 0; i < path.length - 1; i++) {
          expect(grid.hasWall(path[i], path[i + 1])).toBe(false)
        }
      }
    }
  })

  it('solves the serpentine 3x3 maze along every cell', () => {
    const { grid } = generateMaze(3, 3, { random: { next: () => 0.99 } })
    const { path, visits } = solveMaze(grid, cell(0, 0), cell(2, 2))
    const snake = [
      cell(0, 0), cell(0, 1), cell(0, 2),
      cell(1, 2), cell(1, 1), cell(1, 0),
      cell(2, 0), cell(2, 1), cell(2, 2),
    ]
    expect(path).toEqual(snake)
    expect(visits.map((visit) => visit.cell)).toEqual(snake)
    expect(visits.map((visit) => visit.depth)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8])
  })

  it('breaks ties by neighbor order on an open grid', () => {
    const grid = openGrid(3, 3)
    const { path, visits } = solveMaze(grid, cell(0, 0), cell(2, 2))
    expect(visits.map((visit) => visit.cell)).toEqual([
      cell(0, 0), cell(1, 0), cell(0, 1),
      cell(2, 0), cell(1, 1), cell(0, 2),
      cell(2, 1), cell(1, 2), cell(2, 2),
    ])
    expect(path).toEqual([cell(0, 0), cell(1, 0), cell(2, 0), cell(2, 1), cell(2, 2)])
  })

  it('returns a one-cell path when start and end coincide', () => {
    const tiny = new Grid(1, 1)
    const single = solveMaze(tiny, cell(0, 0), cell(0, 0))
    expect(single.path).toEqual([cell(0, 0)])
    expect(single.visits).toEqual([{ cell: cell(0, 0), predecessor: null, depth: 0, order: 0 }])

    const { grid } = generateMaze(5, 5, { seed: 9 })
    expect(solveMaze(grid, cell(2, 3), cell(2, 3)).visits).toHaveLength(1)
  })

  it('produces the same visits and path on every run', () => {
    const { grid } = generateMaze(15, 15, { seed: 77 })
    const first = solveMaze(grid, cell(0, 0), cell(14, 14))
    const second = solveMaze(grid, cell(0, 0), cell(14, 14))
    expect(second).toEqual(first)
  })

  it('links every visit to an earlier one a step closer', () => {
    const { grid } = generateMaze(9, 9, { seed: 4 })
    const { visits } = solveMaze(grid, cell(4, 4), cell(0, 8))
    expect(visits[0].predecessor).toBeNull()
    visits.forEach((visit, index) => {
      expect(visit.order).toBe(index)
      if (visit.predecessor === null) return
      const parent = visits.find(
        (v) => v.cell.row === visit.predecessor?.row && v.cell.col === visit.predecessor?.col
      )
      expect(parent).toBeDefined()
      expect(parent?.order).toBeLessThan(visit.order)
      expect(parent?.depth).toBe(visit.depth - 1)
    })
  })

  it('fails with Unreachable when walls cut the end off', () => {
    const grid = new Grid(2, 2)
    expect(errorKind(() => solveMaze(grid, cell(0, 0), cell(1, 1)))).toBe('Unreachable')
  })

  it('rejects start or end cells outside the grid', () => {
    const grid = new Grid(3, 3)
    expect(errorKind(() => solveMaze(grid, cell(-1, 0), cell(2, 2)))).toBe('InvalidCell')
    expect(errorKind(() => searchMaze(grid, cell(0, 0), cell(3, 3)))).toBe('InvalidCell')
  })
})

describe('MazeSearch', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('stops on discovery by default and on dequeue when asked', () => {
    const grid = openGrid(3, 3)
    const discovered = solveMaze(grid, cell(0, 0), cell(1, 1))
    const dequeued = solveMaze(grid, cell(0, 0), cell(1, 1), { stopWhen: 'dequeued' })

    expect(discovered.visits.map((v) => v.cell)).toEqual([
      cell(0, 0), cell(1, 0), cell(0, 1), cell(2, 0), cell(1, 1),
    ])
    expect(dequeued.visits.map((v) => v.cell)).toEqual([
      cell(0, 0), cell(1, 0), cell(0, 1), cell(2, 0), cell(1, 1), cell(0, 2), cell(2, 1),
    ])
    expect(discovered.path).toEqual([cell(0, 0), cell(1, 0), cell(1, 1)])
    expect(dequeued.path).toEqual(discovered.path)
  })

  it('gives the same sequence whether drained at once or paced by a timer', () => {
    const { grid } = generateMaze(10, 10, { seed: 31 })
    const instant = solveMaze(grid, cell(0, 0), cell(9, 9))

    vi.useFakeTimers()
    const search = searchMaze(grid, cell(0, 0), cell(9, 9))
    const paced: VisitEvent[] = []
    const timer = setInterval(() => {
      const event = search.step()
      if (event) paced.push(event)
      else clearInterval(timer)
    }, 50)
    vi.advanceTimersByTime(50 * (instant.visits.length + 5))

    expect(search.finished).toBe(true)
    expect(paced).toEqual(instant.visits)
    expect(search.path()).toEqual(instant.path)
  })

  it('is forward-only: a second iteration continues where the first stopped', () => {
    const grid = openGrid(3, 3)
    const search = new MazeSearch(grid, cell(0, 0), cell(2, 2))
    search.step()
    search.step()
    const rest = [...search]
    expect(rest[0].order).toBe(2)
    expect(rest).toHaveLength(7)
    expect([...search]).toEqual([])
  })

  it('exposes the frontier between pulls', () => {
    const grid = openGrid(3, 3)
    const search = searchMaze(grid, cell(0, 0), cell(2, 2))
    search.step()
    expect(search.frontier()).toEqual([cell(0, 0)])
    search.step()
    search.step()
    expect(search.frontier()).toEqual([cell(1, 0), cell(0, 1)])
    expect(search.visitedCells()).toEqual([cell(0, 0), cell(1, 0), cell(0, 1)])
    expect(search.visitCount).toBe(3)
  })

  it('raises Unreachable on the pull after the queue runs dry', () => {
    const grid = new Grid(2, 2)
    const search = searchMaze(grid, cell(0, 0), cell(1, 1))
    expect(search.step()).toEqual({ cell: cell(0, 0), predecessor: null, depth: 0, order: 0 })
    expect(errorKind(() => search.step())).toBe('Unreachable')
    expect(search.finished).toBe(true)
    expect(search.reachedEnd).toBe(false)
    expect(search.step()).toBeNull()
    expect(errorKind(() => search.path())).toBe('NoPath')
  })

  it('reports NoPath while the end has not been visited yet', () => {
    const grid = openGrid(4, 4)
    const search = searchMaze(grid, cell(0, 0), cell(3, 3))
    search.step()
    expect(errorKind(() => search.path())).toBe('NoPath')
  })

  it('can be abandoned without touching the grid', () => {
    const { grid } = generateMaze(6, 6, { seed: 8 })
    const before = countPassages(grid)
    const search = searchMaze(grid, cell(0, 0), cell(5, 5))
    for (const event of search) {
      if (event.order === 2) break
    }
    expect(search.finished).toBe(true)
    expect(search.reachedEnd).toBe(false)
    expect(countPassages(grid)).toBe(before)
    expect(solveMaze(grid, cell(0, 0), cell(5, 5)).path[0]).toEqual(cell(0, 0))
  })
})

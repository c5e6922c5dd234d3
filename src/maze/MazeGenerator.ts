import type { CarveStep, Cell, Direction } from '../types'
import { SeededRandom, pick, randomSeed, type RandomSource } from '../utils/seedRandom'
import { Grid, DIRECTIONS, DROW, DCOL } from './Grid'

export interface MazeGenOptions {
  random?: RandomSource
  seed?: number
  origin?: Cell   // defaults to (0, 0)
}

function resolveRandom(options: MazeGenOptions): RandomSource {
  if (options.random) return options.random
  return new SeededRandom(options.seed ?? randomSeed())
}

/**
 * Randomized depth-first carving (recursive backtracker) over an explicit
 * stack. Yields each wall removal as it happens; the grid is mutated in place.
 *
 * On a fresh grid every cell is visited exactly once, so the sequence has
 * `width * height - 1` steps and the passages form a spanning tree.
 *
 * The origin is checked before the first step is pulled.
 */
export function carvePassages(grid: Grid, options: MazeGenOptions = {}): Generator<CarveStep, void, undefined> {
  const origin = options.origin ?? { row: 0, col: 0 }
  grid.assertContains(origin)
  return carve(grid, { row: origin.row, col: origin.col }, resolveRandom(options))
}

function* carve(grid: Grid, origin: Cell, rng: RandomSource): Generator<CarveStep, void, undefined> {
  const visited = new Uint8Array(grid.width * grid.height)
  const stack: Cell[] = [origin]
  visited[grid.indexOf(origin)] = 1

  while (stack.length > 0) {
    const current = stack[stack.length - 1]

    // Find unvisited neighbors
    const candidates: { cell: Cell; dir: Direction }[] = []
    for (const dir of DIRECTIONS) {
      const next = { row: current.row + DROW[dir], col: current.col + DCOL[dir] }
      if (grid.contains(next) && !visited[grid.indexOf(next)]) {
        candidates.push({ cell: next, dir })
      }
    }

    const chosen = pick(rng, candidates)
    if (!chosen) {
      stack.pop()
      continue
    }

    grid.removeWall(current, chosen.cell)
    visited[grid.indexOf(chosen.cell)] = 1
    stack.push(chosen.cell)
    yield { from: current, to: chosen.cell, direction: chosen.dir }
  }
}

export function carveMaze(grid: Grid, options: MazeGenOptions = {}): CarveStep[] {
  return [...carvePassages(grid, options)]
}

export function generateMaze(
  width: number,
  height: number,
  options: MazeGenOptions = {}
): { grid: Grid; steps: CarveStep[] } {
  const grid = new Grid(width, height)
  const steps = carveMaze(grid, options)
  return { grid, steps }
}

import type { GridView } from './Grid'

// Passage graph edges; each removed wall is counted once
export function countPassages(grid: GridView): number {
  let count = 0
  for (const cell of grid.cells()) {
    const walls = grid.wallsOf(cell)
    if (cell.col + 1 < grid.width && !walls.east) count++
    if (cell.row + 1 < grid.height && !walls.south) count++
  }
  return count
}

export function isConnected(grid: GridView): boolean {
  const total = grid.width * grid.height
  const seen = new Uint8Array(total)
  const stack = [{ row: 0, col: 0 }]
  seen[0] = 1
  let reached = 1

  while (stack.length > 0) {
    const cell = stack.pop()
    if (!cell) break
    for (const next of grid.passages(cell)) {
      const index = grid.indexOf(next)
      if (seen[index]) continue
      seen[index] = 1
      reached++
      stack.push(next)
    }
  }
  return reached === total
}

/**
 * A perfect maze is a spanning tree: connected with exactly one edge fewer
 * than it has cells.
 */
export function isPerfectMaze(grid: GridView): boolean {
  return countPassages(grid) === grid.width * grid.height - 1 && isConnected(grid)
}

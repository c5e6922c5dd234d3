import type { Cell } from '../types'
import type { GridView } from '../maze/Grid'

/**
 * The slice of the p5 drawing API the renderer needs. A p5 instance satisfies
 * it as-is.
 */
export interface MazeCanvas {
  stroke(color: string): unknown
  strokeWeight(weight: number): unknown
  noStroke(): unknown
  fill(color: string): unknown
  noFill(): unknown
  line(x1: number, y1: number, x2: number, y2: number): unknown
  rect(x: number, y: number, w: number, h: number): unknown
  circle(x: number, y: number, d: number): unknown
}

export interface MazeOverlay {
  cellSize: number
  visited?: readonly Cell[]
  path?: readonly Cell[]
  start?: Cell
  end?: Cell
}

export const MAZE_COLORS = {
  wall: '#000000',
  visited: '#9db8f0',
  path: '#f2c200',
  start: '#1f9d2f',
  end: '#d42a2a',
} as const

export function renderMaze(p: MazeCanvas, grid: GridView, overlay: MazeOverlay): void {
  const size = overlay.cellSize

  // Visited cells underneath the walls
  if (overlay.visited && overlay.visited.length > 0) {
    p.noStroke()
    p.fill(MAZE_COLORS.visited)
    for (const cell of overlay.visited) {
      p.rect(cell.col * size, cell.row * size, size, size)
    }
  }

  p.stroke(MAZE_COLORS.wall)
  p.strokeWeight(1)

  // Draw cell walls
  for (let row = 0; row < grid.height; row++) {
    for (let col = 0; col < grid.width; col++) {
      const walls = grid.wallsOf({ row, col })
      const left = col * size
      const top = row * size

      if (walls.north) {
        p.line(left, top, left + size, top)
      }
      if (walls.west) {
        p.line(left, top, left, top + size)
      }
      // East wall only on rightmost column
      if (col === grid.width - 1 && walls.east) {
        p.line(left + size, top, left + size, top + size)
      }
      // South wall only on bottom row
      if (row === grid.height - 1 && walls.south) {
        p.line(left, top + size, left + size, top + size)
      }
    }
  }

  if (overlay.path && overlay.path.length > 1) {
    p.stroke(MAZE_COLORS.path)
    p.strokeWeight(Math.max(1, size / 6))
    for (let i = 0; i < overlay.path.length - 1; i++) {
      const a = overlay.path[i]
      const b = overlay.path[i + 1]
      p.line(
        (a.col + 0.5) * size,
        (a.row + 0.5) * size,
        (b.col + 0.5) * size,
        (b.row + 0.5) * size
      )
    }
  }

  // Start and end markers
  p.noStroke()
  if (overlay.start) {
    p.fill(MAZE_COLORS.start)
    p.circle((overlay.start.col + 0.5) * size, (overlay.start.row + 0.5) * size, size / 2)
  }
  if (overlay.end) {
    p.fill(MAZE_COLORS.end)
    p.circle((overlay.end.col + 0.5) * size, (overlay.end.row + 0.5) * size, size / 2)
  }
  p.noFill()
}

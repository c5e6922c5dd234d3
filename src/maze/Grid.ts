import type { Cell, CellWalls, Direction } from '../types'
import { MazeError, formatCell } from './errors'

// Neighbor order used by generation and solving alike
export const DIRECTIONS: readonly Direction[] = ['north', 'south', 'east', 'west']
export const DROW: Record<Direction, number> = { north: -1, south: 1, east: 0, west: 0 }
export const DCOL: Record<Direction, number> = { north: 0, south: 0, east: 1, west: -1 }
export const OPPOSITE: Record<Direction, Direction> = {
  north: 'south',
  south: 'north',
  east: 'west',
  west: 'east',
}

/**
 * Read-only view of a grid. The solver and the renderers only ever see this.
 */
export interface GridView {
  readonly width: number
  readonly height: number
  contains(cell: Cell): boolean
  indexOf(cell: Cell): number
  neighbors(cell: Cell): Cell[]
  passages(cell: Cell): Cell[]
  hasWall(a: Cell, b: Cell): boolean
  wallsOf(cell: Cell): Readonly<CellWalls>
  cells(): Cell[]
}

function createWalls(): CellWalls {
  return { north: true, south: true, east: true, west: true }
}

export function directionBetween(a: Cell, b: Cell): Direction | null {
  for (const dir of DIRECTIONS) {
    if (a.row + DROW[dir] === b.row && a.col + DCOL[dir] === b.col) return dir
  }
  return null
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col
}

export class Grid implements GridView {
  private readonly walls: CellWalls[][]

  constructor(readonly width: number, readonly height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new MazeError(
        'InvalidDimension',
        `Grid dimensions must be positive integers, got ${width}x${height}`
      )
    }

    this.walls = []
    for (let row = 0; row < height; row++) {
      this.walls[row] = []
      for (let col = 0; col < width; col++) {
        this.walls[row][col] = createWalls()
      }
    }
  }

  contains(cell: Cell): boolean {
    return (
      Number.isInteger(cell.row) &&
      Number.isInteger(cell.col) &&
      cell.row >= 0 &&
      cell.row < this.height &&
      cell.col >= 0 &&
      cell.col < this.width
    )
  }

  assertContains(cell: Cell): void {
    if (!this.contains(cell)) {
      throw new MazeError(
        'InvalidCell',
        `Cell ${formatCell(cell)} is outside the ${this.width}x${this.height} grid`
      )
    }
  }

  indexOf(cell: Cell): number {
    this.assertContains(cell)
    return cell.row * this.width + cell.col
  }

  neighbors(cell: Cell): Cell[] {
    this.assertContains(cell)
    const out: Cell[] = []
    for (const dir of DIRECTIONS) {
      const next = { row: cell.row + DROW[dir], col: cell.col + DCOL[dir] }
      if (this.contains(next)) out.push(next)
    }
    return out
  }

  passages(cell: Cell): Cell[] {
    const walls = this.wallsOf(cell)
    return this.neighbors(cell).filter((next) => {
      const dir = directionBetween(cell, next)
      return dir !== null && !walls[dir]
    })
  }

  hasWall(a: Cell, b: Cell): boolean {
    const dir = this.adjacentDirection(a, b)
    return this.walls[a.row][a.col][dir]
  }

  removeWall(a: Cell, b: Cell): void {
    const dir = this.adjacentDirection(a, b)
    this.walls[a.row][a.col][dir] = false
    this.walls[b.row][b.col][OPPOSITE[dir]] = false
  }

  wallsOf(cell: Cell): Readonly<CellWalls> {
    this.assertContains(cell)
    return { ...this.walls[cell.row][cell.col] }
  }

  // Row-major
  cells(): Cell[] {
    const out: Cell[] = []
    for (let row = 0; row < this.height; row++) {
      for (let col = 0; col < this.width; col++) {
        out.push({ row, col })
      }
    }
    return out
  }

  private adjacentDirection(a: Cell, b: Cell): Direction {
    this.assertContains(a)
    this.assertContains(b)
    const dir = directionBetween(a, b)
    if (dir === null) {
      throw new MazeError(
        'NotAdjacent',
        `Cells ${formatCell(a)} and ${formatCell(b)} are not adjacent`
      )
    }
    return dir
  }
}

export function createGrid(width: number, height: number): Grid {
  return new Grid(width, height)
}

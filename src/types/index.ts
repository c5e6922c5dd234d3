export interface Cell {
  row: number
  col: number
}

export type Direction = 'north' | 'south' | 'east' | 'west'

export interface CellWalls {
  north: boolean
  south: boolean
  east: boolean
  west: boolean
}

export interface MazeParameters {
  width: number
  height: number
  start: Cell
  end: Cell
  seed: number
}

// One wall removal made while carving
export interface CarveStep {
  from: Cell
  to: Cell
  direction: Direction
}

export interface VisitEvent {
  cell: Cell
  predecessor: Cell | null
  depth: number   // BFS distance from the start cell
  order: number   // position in the visitation sequence
}

export type StopPolicy = 'discovered' | 'dequeued'

export interface SolveResult {
  path: Cell[]
  visits: VisitEvent[]
}

export interface Line {
  x1: number
  y1: number
  x2: number
  y2: number
}

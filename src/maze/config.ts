import type { Cell, MazeParameters } from '../types'
import { randomSeed } from '../utils/seedRandom'
import { MazeError, formatCell } from './errors'

export const DEFAULT_MAZE_PARAMETERS: Pick<MazeParameters, 'width' | 'height' | 'start'> = {
  width: 20,
  height: 20,
  start: { row: 0, col: 0 },
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0
}

function assertInside(cell: Cell, width: number, height: number, label: string): void {
  const inside =
    Number.isInteger(cell.row) &&
    Number.isInteger(cell.col) &&
    cell.row >= 0 &&
    cell.row < height &&
    cell.col >= 0 &&
    cell.col < width
  if (!inside) {
    throw new MazeError(
      'InvalidCell',
      `${label} cell ${formatCell(cell)} is outside the ${width}x${height} grid`
    )
  }
}

/**
 * Fill in defaults and validate. The end cell defaults to the bottom-right
 * corner of the resolved size, the seed to a fresh random one.
 */
export function resolveMazeParameters(params: Partial<MazeParameters> = {}): MazeParameters {
  const width = params.width ?? DEFAULT_MAZE_PARAMETERS.width
  const height = params.height ?? DEFAULT_MAZE_PARAMETERS.height
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new MazeError(
      'InvalidDimension',
      `Maze dimensions must be positive integers, got ${width}x${height}`
    )
  }

  const start = { ...(params.start ?? DEFAULT_MAZE_PARAMETERS.start) }
  const end = { ...(params.end ?? { row: height - 1, col: width - 1 }) }
  assertInside(start, width, height, 'Start')
  assertInside(end, width, height, 'End')

  return { width, height, start, end, seed: params.seed ?? randomSeed() }
}

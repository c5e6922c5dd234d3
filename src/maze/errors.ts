import type { Cell } from '../types'

export type MazeErrorKind =
  | 'InvalidDimension'
  | 'InvalidCell'
  | 'NotAdjacent'
  | 'Unreachable'
  | 'NoPath'
  | 'AlreadyGenerated'

export class MazeError extends Error {
  constructor(readonly kind: MazeErrorKind, message: string) {
    super(message)
    this.name = 'MazeError'
  }
}

export function isMazeError(err: unknown, kind?: MazeErrorKind): err is MazeError {
  return err instanceof MazeError && (kind === undefined || err.kind === kind)
}

export function formatCell(cell: Cell): string {
  return `(${cell.row}, ${cell.col})`
}

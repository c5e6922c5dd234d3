import type { Cell, VisitEvent } from '../types'
import { isMazeError } from '../maze/errors'
import type { MazeSearch } from '../maze/MazeSolver'

export type AnimationStatus = 'searching' | 'solved' | 'unreachable'

/**
 * Paces a search for display: each `advance()` pulls a bounded number of
 * visit events and keeps what a redraw needs. How often it is called has no
 * effect on the events or the path.
 */
export class SolveAnimation {
  private readonly visited: Cell[] = []
  private latestEvent: VisitEvent | null = null
  private solvedPath: Cell[] = []
  private state: AnimationStatus = 'searching'

  constructor(private readonly search: MazeSearch) {}

  get status(): AnimationStatus {
    return this.state
  }

  get visitedCells(): readonly Cell[] {
    return this.visited
  }

  get latest(): VisitEvent | null {
    return this.latestEvent
  }

  get path(): readonly Cell[] {
    return this.solvedPath
  }

  advance(steps: number = 1): VisitEvent[] {
    const pulled: VisitEvent[] = []

    while (this.state === 'searching' && pulled.length < steps) {
      let event: VisitEvent | null
      try {
        event = this.search.step()
      } catch (err) {
        if (!isMazeError(err, 'Unreachable')) throw err
        this.state = 'unreachable'
        console.warn('Maze search ended without reaching the end:', err.message)
        break
      }

      if (event === null) {
        this.finish()
        break
      }
      pulled.push(event)
      this.visited.push(event.cell)
      this.latestEvent = event
    }

    // Stopping on discovery means the end cell's event is the last one
    if (this.state === 'searching' && this.search.reachedEnd && this.search.stopWhen === 'discovered') {
      this.finish()
    }
    return pulled
  }

  // Runs to completion in one go
  drain(): VisitEvent[] {
    return this.advance(Number.POSITIVE_INFINITY)
  }

  private finish(): void {
    this.solvedPath = this.search.path()
    this.state = 'solved'
  }
}

import type p5 from 'p5'
import type { StopPolicy } from '../types'
import type { Maze } from '../maze/Maze'
import { renderMaze, type MazeCanvas } from './MazeRenderer'
import { SolveAnimation } from './SolveAnimation'

export interface SolveSketchOptions {
  cellSize: number
  frameRate: number       // frames per second; one advance per frame
  stepsPerFrame: number
  stopWhen: StopPolicy
}

export const DEFAULT_SKETCH_OPTIONS: SolveSketchOptions = {
  cellSize: 24,
  frameRate: 20,
  stepsPerFrame: 1,
  stopWhen: 'discovered',
}

// The part of a p5 instance the sketch drives
export interface SketchHost extends MazeCanvas {
  setup: () => void
  draw: () => void
  createCanvas(width: number, height: number): unknown
  pixelDensity(density: number): unknown
  frameRate(fps: number): unknown
  background(gray: number): unknown
  noLoop(): void
}

/**
 * Sketch that animates the search of an already generated maze, one
 * `advance()` per frame, and stops looping once the search is over.
 */
export function createSolveSketch(maze: Maze, options: Partial<SolveSketchOptions> = {}): (p: SketchHost) => void {
  const opts: SolveSketchOptions = { ...DEFAULT_SKETCH_OPTIONS, ...options }

  return (p: SketchHost) => {
    const animation = new SolveAnimation(maze.search({ stopWhen: opts.stopWhen }))

    p.setup = () => {
      p.createCanvas(maze.width * opts.cellSize + 1, maze.height * opts.cellSize + 1)
      p.pixelDensity(1)
      p.frameRate(opts.frameRate)
    }

    p.draw = () => {
      animation.advance(opts.stepsPerFrame)

      p.background(255)
      renderMaze(p, maze.grid, {
        cellSize: opts.cellSize,
        visited: animation.visitedCells,
        path: animation.path,
        start: maze.start,
        end: maze.end,
      })

      if (animation.status !== 'searching') {
        p.noLoop()
        if (animation.status === 'solved') {
          console.log('Path found:', animation.path.length, 'cells,', animation.visitedCells.length, 'visited')
        }
      }
    }
  }
}

// Instance-mode entry: `new p5(p5SolveSketch(maze), container)`
export function p5SolveSketch(maze: Maze, options: Partial<SolveSketchOptions> = {}): (p: p5) => void {
  const sketch = createSolveSketch(maze, options)
  return (p: p5) => sketch(p)
}

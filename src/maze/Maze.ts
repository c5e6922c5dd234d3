import type { CarveStep, Cell, MazeParameters, SolveResult } from '../types'
import { SeededRandom, type RandomSource } from '../utils/seedRandom'
import { resolveMazeParameters } from './config'
import { MazeError } from './errors'
import { Grid, type GridView } from './Grid'
import { carveMaze } from './MazeGenerator'
import { MazeSearch, solveMaze, type SearchOptions } from './MazeSolver'

export interface GenerateOptions {
  random?: RandomSource   // overrides the seeded generator
  origin?: Cell           // defaults to the start cell
}

/**
 * Owns a grid and its start/end cells. The grid is carved once by
 * `generate()` and only handed out read-only afterwards.
 */
export class Maze {
  readonly parameters: MazeParameters
  private readonly cells: Grid
  private generated = false

  constructor(params: Partial<MazeParameters> = {}) {
    this.parameters = resolveMazeParameters(params)
    this.cells = new Grid(this.parameters.width, this.parameters.height)
  }

  get grid(): GridView {
    return this.cells
  }

  get width(): number {
    return this.parameters.width
  }

  get height(): number {
    return this.parameters.height
  }

  get start(): Cell {
    return { ...this.parameters.start }
  }

  get end(): Cell {
    return { ...this.parameters.end }
  }

  get seed(): number {
    return this.parameters.seed
  }

  get isGenerated(): boolean {
    return this.generated
  }

  generate(options: GenerateOptions = {}): CarveStep[] {
    if (this.generated) {
      throw new MazeError('AlreadyGenerated', 'Maze has already been carved')
    }
    const steps = carveMaze(this.cells, {
      random: options.random ?? new SeededRandom(this.parameters.seed),
      origin: options.origin ?? this.parameters.start,
    })
    this.generated = true
    return steps
  }

  search(options: SearchOptions = {}): MazeSearch {
    return new MazeSearch(this.cells, this.parameters.start, this.parameters.end, options)
  }

  solve(options: SearchOptions = {}): SolveResult {
    return solveMaze(this.cells, this.parameters.start, this.parameters.end, options)
  }
}

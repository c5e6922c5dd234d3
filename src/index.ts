export type {
  Cell,
  CellWalls,
  Direction,
  MazeParameters,
  CarveStep,
  VisitEvent,
  StopPolicy,
  SolveResult,
  Line,
} from './types'

export { MazeError, isMazeError } from './maze/errors'
export type { MazeErrorKind } from './maze/errors'

export { Grid, createGrid, directionBetween, sameCell, DIRECTIONS } from './maze/Grid'
export type { GridView } from './maze/Grid'

export { carvePassages, carveMaze, generateMaze } from './maze/MazeGenerator'
export type { MazeGenOptions } from './maze/MazeGenerator'

export { MazeSearch, searchMaze, solveMaze } from './maze/MazeSolver'
export type { SearchOptions } from './maze/MazeSolver'

export { countPassages, isConnected, isPerfectMaze } from './maze/analysis'
export { DEFAULT_MAZE_PARAMETERS, resolveMazeParameters } from './maze/config'
export { Maze } from './maze/Maze'
export type { GenerateOptions } from './maze/Maze'

export { SeededRandom, randomInt, pick, randomSeed } from './utils/seedRandom'
export type { RandomSource } from './utils/seedRandom'

export { renderMaze, MAZE_COLORS } from './rendering/MazeRenderer'
export type { MazeCanvas, MazeOverlay } from './rendering/MazeRenderer'
export { SolveAnimation } from './rendering/SolveAnimation'
export type { AnimationStatus } from './rendering/SolveAnimation'
export { createSolveSketch, p5SolveSketch, DEFAULT_SKETCH_OPTIONS } from './rendering/sketch'
export type { SolveSketchOptions, SketchHost } from './rendering/sketch'
export { exportSvg, extractWallRuns, DEFAULT_SVG_OPTIONS } from './rendering/SvgExporter'
export type { SvgExportOptions } from './rendering/SvgExporter'

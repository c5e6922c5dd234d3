import type { Cell, Line } from '../types'
import type { GridView } from '../maze/Grid'
import { MAZE_COLORS } from './MazeRenderer'

export interface SvgExportOptions {
  cellSize: number      // px per cell in the output size
  strokeWidth: number   // px
  path?: readonly Cell[]
  start?: Cell
  end?: Cell
}

export const DEFAULT_SVG_OPTIONS: SvgExportOptions = {
  cellSize: 10,
  strokeWidth: 1,
}

const precision = 4

function fmt(value: number): string {
  return value.toFixed(precision)
}

// Close the current run of wall segments, if any
function flushRun(lines: Line[], run: Line | null): null {
  if (run) lines.push(run)
  return null
}

/**
 * Wall segments in cell units, merged into maximal straight runs. Horizontal
 * runs come first, top to bottom, then vertical runs, left to right.
 */
export function extractWallRuns(grid: GridView): Line[] {
  const lines: Line[] = []

  for (let y = 0; y <= grid.height; y++) {
    let run: Line | null = null
    for (let col = 0; col < grid.width; col++) {
      const present = y < grid.height
        ? grid.wallsOf({ row: y, col }).north
        : grid.wallsOf({ row: y - 1, col }).south
      if (!present) {
        run = flushRun(lines, run)
      } else if (run) {
        run.x2 = col + 1
      } else {
        run = { x1: col, y1: y, x2: col + 1, y2: y }
      }
    }
    flushRun(lines, run)
  }

  for (let x = 0; x <= grid.width; x++) {
    let run: Line | null = null
    for (let row = 0; row < grid.height; row++) {
      const present = x < grid.width
        ? grid.wallsOf({ row, col: x }).west
        : grid.wallsOf({ row, col: x - 1 }).east
      if (!present) {
        run = flushRun(lines, run)
      } else if (run) {
        run.y2 = row + 1
      } else {
        run = { x1: x, y1: row, x2: x, y2: row + 1 }
      }
    }
    flushRun(lines, run)
  }

  return lines
}

export function exportSvg(grid: GridView, options: Partial<SvgExportOptions> = {}): string {
  const opts: SvgExportOptions = { ...DEFAULT_SVG_OPTIONS, ...options }
  const walls = extractWallRuns(grid)

  // Stroke width is given in px; the viewBox is in cell units
  const scaledStroke = opts.strokeWidth / opts.cellSize

  let svg = `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg"
     width="${grid.width * opts.cellSize}"
     height="${grid.height * opts.cellSize}"
     viewBox="0 0 ${grid.width} ${grid.height}">
  <g fill="none" stroke="${MAZE_COLORS.wall}" stroke-width="${fmt(scaledStroke)}" stroke-linecap="square">
`
  for (const line of walls) {
    svg += `    <line x1="${fmt(line.x1)}" y1="${fmt(line.y1)}" x2="${fmt(line.x2)}" y2="${fmt(line.y2)}"/>\n`
  }
  svg += `  </g>\n`

  if (opts.path && opts.path.length > 1) {
    const points = opts.path.map((cell) => `${fmt(cell.col + 0.5)},${fmt(cell.row + 0.5)}`).join(' ')
    svg += `  <polyline fill="none" stroke="${MAZE_COLORS.path}" stroke-width="${fmt(scaledStroke * 2)}" points="${points}"/>\n`
  }
  if (opts.start) {
    svg += `  <circle cx="${fmt(opts.start.col + 0.5)}" cy="${fmt(opts.start.row + 0.5)}" r="0.2500" fill="${MAZE_COLORS.start}"/>\n`
  }
  if (opts.end) {
    svg += `  <circle cx="${fmt(opts.end.col + 0.5)}" cy="${fmt(opts.end.row + 0.5)}" r="0.2500" fill="${MAZE_COLORS.end}"/>\n`
  }

  svg += `</svg>`
  return svg
}

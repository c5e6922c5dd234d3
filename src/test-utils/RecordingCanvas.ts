import type { MazeCanvas } from '../rendering/MazeRenderer'

// Records every drawing call as `name(arg,arg,...)`
export class RecordingCanvas implements MazeCanvas {
  readonly calls: string[] = []

  protected record(name: string, args: (string | number)[]): void {
    this.calls.push(`${name}(${args.join(',')})`)
  }

  stroke(color: string): void { this.record('stroke', [color]) }
  strokeWeight(weight: number): void { this.record('strokeWeight', [weight]) }
  noStroke(): void { this.record('noStroke', []) }
  fill(color: string): void { this.record('fill', [color]) }
  noFill(): void { this.record('noFill', []) }
  line(x1: number, y1: number, x2: number, y2: number): void { this.record('line', [x1, y1, x2, y2]) }
  rect(x: number, y: number, w: number, h: number): void { this.record('rect', [x, y, w, h]) }
  circle(x: number, y: number, d: number): void { this.record('circle', [x, y, d]) }
}

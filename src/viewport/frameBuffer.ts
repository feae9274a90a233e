/**
 * Software frame buffer: one 0xRRGGBB value per pixel, row-major.
 *
 * Lines are clipped to the buffer (Liang–Barsky) before Bresenham
 * rasterization, so endpoints far outside the viewport cost no more than
 * on-screen ones. Non-finite endpoints draw nothing.
 */

export interface Point2 {
  u: number
  v: number
}

/** What the renderer draws onto. `present` makes the finished frame visible. */
export interface DisplaySurface {
  readonly width: number
  readonly height: number
  clear(color: number): void
  drawLine(p0: Point2, p1: Point2, color: number): void
  present(): void
}

/**
 * Clip the segment p0→p1 to the rectangle [0, maxU] × [0, maxV].
 *
 * @returns The clipped endpoints, or null when the segment lies outside or
 *   its extent overflows.
 */
export function clipSegment(
  p0: Point2,
  p1: Point2,
  maxU: number,
  maxV: number,
): [Point2, Point2] | null {
  const du = p1.u - p0.u
  const dv = p1.v - p0.v
  // Finite endpoints can still be too far apart to subtract.
  if (!Number.isFinite(du) || !Number.isFinite(dv)) return null
  let t0 = 0
  let t1 = 1

  // Each pair is (p, q) for one boundary: inside when p·t <= q.
  const edges: Array<[number, number]> = [
    [-du, p0.u],
    [du, maxU - p0.u],
    [-dv, p0.v],
    [dv, maxV - p0.v],
  ]
  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null
      continue
    }
    const t = q / p
    if (p < 0) {
      if (t > t1) return null
      if (t > t0) t0 = t
    } else {
      if (t < t0) return null
      if (t < t1) t1 = t
    }
  }

  const a = { u: p0.u + t0 * du, v: p0.v + t0 * dv }
  const b = { u: p0.u + t1 * du, v: p0.v + t1 * dv }
  if (![a.u, a.v, b.u, b.v].every(Number.isFinite)) return null
  return [a, b]
}

export class FrameBuffer {
  readonly pixels: Uint32Array

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.pixels = new Uint32Array(width * height)
  }

  clear(color: number): void {
    this.pixels.fill(color)
  }

  getPixel(x: number, y: number): number {
    return this.pixels[y * this.width + x]
  }

  setPixel(x: number, y: number, color: number): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return
    this.pixels[y * this.width + x] = color
  }

  drawLine(p0: Point2, p1: Point2, color: number): void {
    if (![p0.u, p0.v, p1.u, p1.v].every(Number.isFinite)) return
    const clipped = clipSegment(p0, p1, this.width - 1, this.height - 1)
    if (clipped === null) return
    const [a, b] = clipped

    let x0 = Math.round(a.u)
    let y0 = Math.round(a.v)
    const x1 = Math.round(b.u)
    const y1 = Math.round(b.v)

    const dx = Math.abs(x1 - x0)
    const sx = x0 < x1 ? 1 : -1
    const dy = -Math.abs(y1 - y0)
    const sy = y0 < y1 ? 1 : -1
    let err = dx + dy

    for (;;) {
      this.setPixel(x0, y0, color)
      if (x0 === x1 && y0 === y1) break
      const e2 = 2 * err
      if (e2 >= dy) {
        err += dy
        x0 += sx
      }
      if (e2 <= dx) {
        err += dx
        y0 += sy
      }
    }
  }
}

/**
 * DisplaySurface backed by an HTML canvas.
 *
 * Drawing goes into a FrameBuffer; `present()` copies the finished frame into
 * the canvas in one `putImageData` call.
 */

import { displaySurfaceError } from '../api/errors'
import { FrameBuffer, type DisplaySurface, type Point2 } from './frameBuffer'

export class CanvasSurface implements DisplaySurface {
  private readonly buffer: FrameBuffer
  private readonly ctx: CanvasRenderingContext2D
  private readonly image: ImageData

  constructor(
    private readonly canvas: HTMLCanvasElement,
    width: number,
    height: number,
  ) {
    const ctx = canvas.getContext('2d')
    if (ctx === null) {
      throw displaySurfaceError('2D canvas context is not available')
    }
    canvas.width = width
    canvas.height = height
    this.ctx = ctx
    this.buffer = new FrameBuffer(width, height)
    this.image = ctx.createImageData(width, height)
  }

  get width(): number {
    return this.buffer.width
  }

  get height(): number {
    return this.buffer.height
  }

  clear(color: number): void {
    this.buffer.clear(color)
  }

  drawLine(p0: Point2, p1: Point2, color: number): void {
    this.buffer.drawLine(p0, p1, color)
  }

  /**
   * @throws AppError "DisplaySurfaceError" once the canvas has been removed
   *   from the document.
   */
  present(): void {
    if (!this.canvas.isConnected) {
      throw displaySurfaceError('Canvas was detached from the document')
    }
    const data = this.image.data
    const pixels = this.buffer.pixels
    for (let i = 0; i < pixels.length; i++) {
      const c = pixels[i]
      const o = i * 4
      data[o] = (c >> 16) & 0xff
      data[o + 1] = (c >> 8) & 0xff
      data[o + 2] = c & 0xff
      data[o + 3] = 0xff
    }
    this.ctx.putImageData(this.image, 0, 0)
  }
}

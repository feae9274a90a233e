/**
 * Viewer configuration.
 *
 * Every tunable the viewer uses lives here with its default. Numeric values
 * can be overridden at build time through `VITE_*` environment variables
 * (e.g. `VITE_ZOOM_STEP=0.25`); invalid overrides are ignored.
 */

/** Colors as 0xRRGGBB integers. */
export const BLACK = 0x000000
export const WHITE = 0xffffff
export const RED = 0xff0000
export const GREEN = 0x00ff00
export const BLUE = 0x0000ff

export interface ViewerConfig {
  /** Frame buffer size in pixels. */
  width: number
  height: number
  /** Projection scale at zoom 1. */
  baseScale: number
  /** Camera distance from the model origin along Z. */
  cameraDistance: number
  /** Smallest projection denominator; nearer points are clamped to it. */
  epsilon: number
  initialZoom: number
  minZoom: number
  maxZoom: number
  zoomStep: number
  /** Radians of rotation per pixel of mouse drag. */
  rotationSensitivity: number
  /** Radians added to rotationY per frame while auto-rotating. */
  autoRotateStep: number
  autoRotate: boolean
  frameIntervalMs: number
  /** Colors cycled by the background / object color keys. */
  palette: readonly number[]
  /** Starting palette indices. */
  backgroundColor: number
  objectColor: number
}

export const DEFAULT_CONFIG: ViewerConfig = {
  width: 1000,
  height: 800,
  baseScale: 600,
  cameraDistance: 8,
  epsilon: 1e-3,
  initialZoom: 1,
  minZoom: 0.1,
  maxZoom: 10,
  zoomStep: 0.1,
  rotationSensitivity: 0.01,
  autoRotateStep: 0.01,
  autoRotate: true,
  frameIntervalMs: 16, // ~60 fps
  palette: [BLACK, WHITE, RED, GREEN, BLUE],
  backgroundColor: 1,
  objectColor: 0,
}

type NumericKey = {
  [K in keyof ViewerConfig]: ViewerConfig[K] extends number ? K : never
}[keyof ViewerConfig]

const ENV_KEYS: ReadonlyArray<[string, NumericKey]> = [
  ['VITE_CANVAS_WIDTH', 'width'],
  ['VITE_CANVAS_HEIGHT', 'height'],
  ['VITE_BASE_SCALE', 'baseScale'],
  ['VITE_CAMERA_DISTANCE', 'cameraDistance'],
  ['VITE_MIN_ZOOM', 'minZoom'],
  ['VITE_MAX_ZOOM', 'maxZoom'],
  ['VITE_ZOOM_STEP', 'zoomStep'],
  ['VITE_ROTATION_SENSITIVITY', 'rotationSensitivity'],
  ['VITE_AUTO_ROTATE_STEP', 'autoRotateStep'],
  ['VITE_FRAME_INTERVAL_MS', 'frameIntervalMs'],
]

/**
 * Apply `VITE_*` overrides from `env` on top of `base`.
 *
 * Only positive finite numbers are accepted. If the result would leave
 * `minZoom > maxZoom`, both zoom bounds fall back to `base`.
 */
export function resolveConfig(
  env: Record<string, string | boolean | undefined>,
  base: ViewerConfig = DEFAULT_CONFIG,
): ViewerConfig {
  const config: ViewerConfig = { ...base }
  for (const [name, key] of ENV_KEYS) {
    const raw = env[name]
    if (typeof raw !== 'string' || raw.trim() === '') continue
    const value = Number(raw)
    if (Number.isFinite(value) && value > 0) {
      config[key] = value
    } else {
      console.error(`Ignoring ${name}=${raw}: expected a positive number`)
    }
  }
  if (env.VITE_AUTO_ROTATE === 'false') config.autoRotate = false

  if (config.minZoom > config.maxZoom) {
    config.minZoom = base.minZoom
    config.maxZoom = base.maxZoom
  }
  return config
}

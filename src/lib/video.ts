// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { CoverageError } from './errors.js'
import { CapturedFrame } from './sequencer.js'
import { ImageSize } from './streetview.js'
import { assert } from './utils.js'

export interface OverlayOptions {
  streetName: boolean
  distance: boolean
  progressBar: boolean
}

export interface VideoSpec extends ImageSize {
  /** Seconds */
  duration: number
  fps: number
  /** Frames blended at each transition */
  crossfade: number
  codec: string
  overlay: OverlayOptions
}

/** What to draw over one output frame */
export interface OverlayContent {
  fallback: boolean
  streetName?: string
  /** Meters from the start */
  distance?: number
  /** 0 to 1 */
  progress?: number
}

export interface FrameRenderer {
  /** Raw RGB pixels of `size`; a null image becomes a blank frame */
  decode(image: Buffer | null, size: ImageSize): Promise<Buffer>
  compose(pixels: Buffer, overlay: OverlayContent, size: ImageSize): Promise<Buffer>
}

export interface VideoEncoder {
  /**
   * Resolves to the written path; nothing exists at `outputPath` unless it resolves.
   * Aborting `signal` stops the encoder and rejects with the abort reason.
   */
  encode(
    frames: AsyncIterable<Buffer>,
    spec: VideoSpec,
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<string>
}

export interface FrameStep {
  /** Captured image shown (and owning the overlay) */
  image: number
  /** Image being blended in, null for a plain frame */
  next: number | null
  /** Blend weight of `next` */
  t: number
}

export function totalFrameCount(spec: Pick<VideoSpec, 'duration' | 'fps'>): number {
  return Math.round(spec.duration * spec.fps)
}

/**
 * Splits `total` frames across buckets in proportion to their weights (or evenly across
 * `weights` buckets). Every bucket gets the floor or ceiling of its quota and the counts
 * sum to `total`; rounding the running sum spreads the remainder along the sequence.
 */
export function apportionFrames(total: number, weights: number | readonly number[]): number[] {
  const w = typeof weights === 'number' ? new Array<number>(weights).fill(1) : weights
  assert(w.length > 0, 'Nothing to apportion frames to')
  assert(Number.isInteger(total) && total >= 0, `Invalid frame total: ${total}`)
  assert(
    w.every((x) => x >= 0),
    'Weights must not be negative',
  )
  const sum = w.reduce((a, b) => a + b, 0)
  assert(sum > 0, 'Weights must not all be zero')

  let cumulative = 0
  let previous = 0
  return w.map((weight, i) => {
    cumulative += weight
    const boundary = i === w.length - 1 ? total : Math.round((total * cumulative) / sum)
    const count = boundary - previous
    previous = boundary
    return count
  })
}

/**
 * One step per output frame. The last `min(crossfade, count - 1)` frames of each image
 * blend toward the next shown image; the final image holds to the end.
 */
export function planFrames(counts: readonly number[], crossfade: number): FrameStep[] {
  const steps: FrameStep[] = []
  for (let i = 0; i < counts.length; i++) {
    const count = counts[i]
    if (count <= 0) continue
    let next: number | null = null
    for (let j = i + 1; j < counts.length; j++) {
      if (counts[j] > 0) {
        next = j
        break
      }
    }
    const blended = next === null ? 0 : Math.max(0, Math.min(crossfade, count - 1))
    for (let j = 0; j < count - blended; j++) steps.push({ image: i, next: null, t: 0 })
    for (let j = 0; j < blended; j++) steps.push({ image: i, next, t: (j + 1) / (blended + 1) })
  }
  return steps
}

/** `(1 - t) * a + t * b` per channel; t = 0 gives `a` and t = 1 gives `b` exactly */
export function blendPixels(a: Buffer, b: Buffer, t: number): Buffer {
  assert(a.length === b.length, `Cannot blend frames of ${a.length} and ${b.length} bytes`)
  if (t <= 0) return Buffer.from(a)
  if (t >= 1) return Buffer.from(b)
  const out = Buffer.allocUnsafe(a.length)
  for (let i = 0; i < a.length; i++) out[i] = Math.round(a[i] + (b[i] - a[i]) * t)
  return out
}

export function overlayFor(
  frame: CapturedFrame,
  routeLength: number,
  options: OverlayOptions,
): OverlayContent {
  const overlay: OverlayContent = { fallback: frame.kind === 'fallback-map' }
  const name = frame.label ?? frame.streetName
  if (options.streetName && name) overlay.streetName = name
  if (options.distance) overlay.distance = frame.distance
  if (options.progressBar) overlay.progress = routeLength > 0 ? frame.distance / routeLength : 0
  return overlay
}

export interface AssembleOptions {
  renderer: FrameRenderer
  encoder: VideoEncoder
  outputPath: string
  signal?: AbortSignal
  onProgress?: (done: number, total: number) => void
}

export async function assembleVideo(
  frames: readonly CapturedFrame[],
  spec: VideoSpec,
  { renderer, encoder, outputPath, signal, onProgress }: AssembleOptions,
): Promise<string> {
  if (frames.length === 0) throw new CoverageError('No captured images to assemble')

  const steps = planFrames(apportionFrames(totalFrameCount(spec), frames.length), spec.crossfade)
  const routeLength = frames[frames.length - 1].distance
  const size: ImageSize = { width: spec.width, height: spec.height }

  async function* render(): AsyncGenerator<Buffer> {
    // Steps only move forward, so at most the current and next image stay decoded
    const decoded = new Map<number, Buffer>()
    const load = async (index: number) => {
      let pixels = decoded.get(index)
      if (!pixels) {
        pixels = await renderer.decode(frames[index].image, size)
        decoded.set(index, pixels)
      }
      return pixels
    }

    for (let i = 0; i < steps.length; i++) {
      signal?.throwIfAborted()
      const step = steps[i]
      for (const index of decoded.keys()) if (index < step.image) decoded.delete(index)
      const current = await load(step.image)
      const pixels =
        step.next === null ? current : blendPixels(current, await load(step.next), step.t)
      const overlay = overlayFor(frames[step.image], routeLength, spec.overlay)
      yield await renderer.compose(pixels, overlay, size)
      onProgress?.(i + 1, steps.length)
    }
  }

  return encoder.encode(render(), spec, outputPath, signal)
}

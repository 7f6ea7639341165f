// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import pMap from 'p-map'
import { ImageCache } from './cache.js'
import { CoverageError } from './errors.js'
import { GeoPoint } from './geo.js'
import { ReverseGeocoder } from './geocoder.js'
import { RoutePoint } from './route.js'
import {
  FallbackImageProvider,
  formatLocation,
  ImageSize,
  PanoramaProvider,
  PanoramaView,
} from './streetview.js'
import { hashRequest } from './utils.js'

export type CaptureKind = 'panorama' | 'fallback-map'

export interface CapturedFrame extends RoutePoint {
  /** Null when neither a panorama nor a fallback could be fetched */
  readonly image: Buffer | null
  readonly kind: CaptureKind
  readonly label?: string
}

/** Inclusive indices of a maximal run of fallback frames */
export interface GapSegment {
  readonly start: number
  readonly end: number
}

export interface CaptureStats {
  panoramas: number
  fallbacks: number
  missing: number
  cacheHits: number
}

export interface CapturedSequence {
  readonly frames: readonly CapturedFrame[]
  readonly gaps: readonly GapSegment[]
  readonly stats: CaptureStats
}

export interface CaptureOptions {
  panorama: PanoramaProvider
  fallback: FallbackImageProvider
  cache: ImageCache
  size: ImageSize
  fov: number
  pitch: number
  /** Part of the fallback cache key */
  fallbackZoom?: number
  concurrency?: number
  labeler?: ReverseGeocoder
  signal?: AbortSignal
  onProgress?: (done: number, total: number) => void
  onWarning?: (message: string) => void
}

export function panoramaCacheKey(point: GeoPoint, view: PanoramaView): string {
  return hashRequest({
    kind: 'panorama',
    location: formatLocation(point),
    heading: view.heading.toFixed(1),
    pitch: view.pitch,
    fov: view.fov,
    size: `${view.width}x${view.height}`,
  })
}

export function fallbackCacheKey(point: GeoPoint, size: ImageSize, zoom: number): string {
  return hashRequest({
    kind: 'fallback-map',
    location: formatLocation(point),
    zoom,
    size: `${size.width}x${size.height}`,
  })
}

export async function acquireImages(
  points: readonly RoutePoint[],
  options: CaptureOptions,
): Promise<CapturedSequence> {
  const { panorama, fallback, cache, size, fov, pitch, fallbackZoom = 18, labeler } = options
  const { concurrency = 8, signal, onProgress, onWarning } = options
  const stats: CaptureStats = { panoramas: 0, fallbacks: 0, missing: 0, cacheHits: 0 }
  const labels = new Map<number, Promise<string | undefined>>()
  const describe = (e: unknown) => (e instanceof Error ? e.message : String(e))

  const labelFor = (point: RoutePoint): Promise<string | undefined> => {
    if (point.streetName) return Promise.resolve(point.streetName)
    if (!labeler) return Promise.resolve(undefined)
    let label = labels.get(point.edgeId)
    if (!label) {
      label = labeler.reverseGeocode(point).then(
        (name) => name ?? undefined,
        (e) => {
          onWarning?.(`Reverse geocoding failed: ${describe(e)}`)
          return undefined
        },
      )
      labels.set(point.edgeId, label)
    }
    return label
  }

  const capture = async (
    point: RoutePoint,
  ): Promise<{ image: Buffer | null; kind: CaptureKind }> => {
    const view: PanoramaView = { ...size, heading: point.heading, pitch, fov }
    const panoramaKey = panoramaCacheKey(point, view)
    const fallbackKey = fallbackCacheKey(point, size, fallbackZoom)

    const cachedPanorama = await cache.get(panoramaKey)
    if (cachedPanorama) {
      stats.cacheHits++
      return { image: cachedPanorama, kind: 'panorama' }
    }
    const cachedFallback = await cache.get(fallbackKey)
    if (cachedFallback) {
      stats.cacheHits++
      return { image: cachedFallback, kind: 'fallback-map' }
    }

    let available = false
    try {
      available = (await panorama.metadata(point)).available
    } catch (e) {
      onWarning?.(`Panorama lookup at ${formatLocation(point)} failed: ${describe(e)}`)
    }

    if (available) {
      let image: Buffer | null = null
      try {
        image = await panorama.fetchImage(point, view)
      } catch (e) {
        onWarning?.(`Panorama at ${formatLocation(point)} failed: ${describe(e)}`)
      }
      if (image) {
        await cache.put(panoramaKey, image)
        return { image, kind: 'panorama' }
      }
    }

    let image: Buffer | null = null
    try {
      image = await fallback.fetchImage(point, size)
    } catch (e) {
      onWarning?.(`Fallback image at ${formatLocation(point)} failed: ${describe(e)}`)
    }
    if (image) await cache.put(fallbackKey, image)
    return { image, kind: 'fallback-map' }
  }

  let done = 0
  // p-map keeps results in input order regardless of completion order
  const frames = await pMap(
    points,
    async (point): Promise<CapturedFrame> => {
      signal?.throwIfAborted()
      const [{ image, kind }, label] = await Promise.all([capture(point), labelFor(point)])
      if (!image) stats.missing++
      else if (kind === 'panorama') stats.panoramas++
      else stats.fallbacks++
      onProgress?.(++done, points.length)
      return label ? { ...point, image, kind, label } : { ...point, image, kind }
    },
    { concurrency, signal },
  )

  if (!frames.some((frame) => frame.image !== null)) {
    throw new CoverageError('No imagery could be fetched for any point of the route')
  }
  return { frames, gaps: findGapSegments(frames), stats }
}

export function findGapSegments(frames: readonly { kind: CaptureKind }[]): GapSegment[] {
  const gaps: GapSegment[] = []
  let start = -1
  frames.forEach((frame, i) => {
    if (frame.kind === 'fallback-map') {
      if (start < 0) start = i
    } else if (start >= 0) {
      gaps.push({ start, end: i - 1 })
      start = -1
    }
  })
  if (start >= 0) gaps.push({ start, end: frames.length - 1 })
  return gaps
}

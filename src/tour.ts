// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { SingleBar } from 'cli-progress'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Config, TourSettings } from './config.js'
import { queryRadius, resolveWalkableArea, WalkableAreaProvider } from './lib/area.js'
import { FileImageCache, ImageCache, MemoryImageCache } from './lib/cache.js'
import { createFetchClient, createProxyClient } from './lib/client.js'
import { ResponseDatabase } from './lib/database.js'
import { describeError, InputError } from './lib/errors.js'
import { FfmpegEncoder } from './lib/ffmpeg.js'
import { SharpFrameRenderer } from './lib/frames.js'
import { GeoPoint } from './lib/geo.js'
import { Geocoder, GoogleGeocoder, ReverseGeocoder } from './lib/geocoder.js'
import { assertCoverage, buildStreetGraph } from './lib/graph.js'
import { OpenRouteServiceIsochrones } from './lib/isochrone.js'
import { OverpassStreets, StreetDataProvider } from './lib/overpass.js'
import { generateRoute } from './lib/route.js'
import { acquireImages, CaptureStats, GapSegment } from './lib/sequencer.js'
import {
  FallbackImageProvider,
  PanoramaProvider,
  SatelliteMapProvider,
  StreetViewProvider,
} from './lib/streetview.js'
import { createRandom, makeDirectoryForFile, safeFileName, seedFromText } from './lib/utils.js'
import { assembleVideo, FrameRenderer, VideoEncoder } from './lib/video.js'

export interface ProgressHandle {
  update(done: number, total: number): void
  stop(): void
}

/** Where a run reports what it is doing */
export interface Reporter {
  log(message: string): void
  warn(message: string): void
  progress(label: string): ProgressHandle
}

export const consoleReporter: Reporter = {
  log: (message) => console.log(message),
  warn: (message) => console.error(`  Warning: ${message}`),
  progress(label) {
    const bar = new SingleBar({
      etaBuffer: 10000,
      format: `  ${label} [{bar}] {percentage}% | {value}/{total} | ETA: {eta}s`,
    })
    let started = false
    return {
      update(done, total) {
        if (!started) {
          bar.start(total, 0)
          started = true
        }
        bar.update(done)
      },
      stop() {
        if (started) bar.stop()
      },
    }
  },
}

export const silentReporter: Reporter = {
  log: () => undefined,
  warn: () => undefined,
  progress: () => ({ update: () => undefined, stop: () => undefined }),
}

export interface TourServices {
  geocoder: Geocoder
  labeler?: ReverseGeocoder
  /** Walking isochrones; the area is a disk without one */
  area?: WalkableAreaProvider
  streets: StreetDataProvider
  panorama: PanoramaProvider
  fallback: FallbackImageProvider
  cache: ImageCache
  renderer: FrameRenderer
  encoder: VideoEncoder
}

/** Wires the real providers; `close` releases the response database */
export function createServices(config: Config, reporter: Reporter) {
  const client = config.socksProxy ? createProxyClient(config.socksProxy) : createFetchClient()
  let db: ResponseDatabase | undefined
  let cache: ImageCache
  if (config.cacheDir) {
    const filename = join(config.cacheDir, 'responses.sqlite')
    makeDirectoryForFile(filename)
    db = ResponseDatabase.open(filename)
    cache = new FileImageCache(join(config.cacheDir, 'images'))
  } else {
    cache = new MemoryImageCache()
  }

  const google = { apiKey: config.googleApiKey, client, db }
  const geocoder = new GoogleGeocoder(google)
  const onWarning = (message: string) => reporter.warn(message)
  const services: TourServices = {
    geocoder,
    labeler: geocoder,
    area: config.orsApiKey
      ? new OpenRouteServiceIsochrones({ apiKey: config.orsApiKey, client, db })
      : undefined,
    streets: new OverpassStreets({ client, db, onWarning }),
    panorama: new StreetViewProvider(google),
    fallback: new SatelliteMapProvider(google, config.fallbackZoom),
    cache,
    renderer: new SharpFrameRenderer(onWarning),
    encoder: new FfmpegEncoder(),
  }
  return { services, close: () => db?.close() }
}

export interface TourRequest {
  address: string
  /** Defaults to a file named after the address in the output directory */
  outputPath?: string
  radius?: number
  /** Defaults to a value derived from the address, so re-runs reproduce the route */
  seed?: number
  signal?: AbortSignal
}

export interface TourResult {
  address: string
  outputPath: string
  center: GeoPoint
  seed: number
  routeLength: number
  waypoints: number
  gaps: readonly GapSegment[]
  stats: CaptureStats
}

export async function generateTour(
  request: TourRequest,
  settings: TourSettings,
  services: TourServices,
  reporter: Reporter = silentReporter,
): Promise<TourResult> {
  const { address, signal } = request
  const { targetLength, interval, walkingPace } = settings
  const radius = request.radius ?? settings.radius
  const onWarning = (message: string) => reporter.warn(message)

  reporter.log(`Generating neighborhood tour for: ${address}`)

  reporter.log('Step 1/4: Geocoding address...')
  const center = await services.geocoder.resolveAddress(address)
  reporter.log(`  Location: ${center.lat.toFixed(6)}, ${center.lng.toFixed(6)}`)

  reporter.log(`Step 2/4: Generating ${(targetLength / 1000).toFixed(1)}km walking route...`)
  const area = await resolveWalkableArea(center, {
    targetLength,
    radius,
    walkingPace,
    provider: services.area,
    onWarning,
  })
  const segments = await services.streets.fetchSegments(center, queryRadius(area, center))
  const graph = buildStreetGraph(segments, area)
  assertCoverage(graph, center, targetLength)
  const seed = request.seed ?? seedFromText(address)
  const route = generateRoute(graph, center, {
    targetLength,
    interval,
    random: createRandom(seed),
  })
  reporter.log(
    `  Generated ${route.points.length} waypoints over ${graph.edges.length} street edges ` +
      `(seed ${seed})`,
  )

  signal?.throwIfAborted()
  reporter.log('Step 3/4: Fetching street-level images...')
  const fetching = reporter.progress('Fetching')
  const sequence = await acquireImages(route.points, {
    panorama: services.panorama,
    fallback: services.fallback,
    cache: services.cache,
    size: settings.video,
    fov: settings.fov,
    pitch: settings.pitch,
    fallbackZoom: settings.fallbackZoom,
    concurrency: settings.concurrency,
    labeler: services.labeler,
    signal,
    onProgress: (done, total) => fetching.update(done, total),
    onWarning,
  }).finally(() => fetching.stop())
  const { stats, gaps } = sequence
  reporter.log(
    `  ${stats.panoramas} panoramas, ${stats.fallbacks} fallback images, ` +
      `${stats.missing} missing, ${stats.cacheHits} from cache`,
  )
  if (gaps.length > 0) reporter.log(`  ${gaps.length} stretches without street-level coverage`)

  const { video } = settings
  reporter.log(`Step 4/4: Creating ${video.duration}s flythrough video...`)
  const outputPath = request.outputPath ?? defaultOutputPath(address, settings.outputDir)
  const rendering = reporter.progress('Rendering')
  await assembleVideo(sequence.frames, video, {
    renderer: services.renderer,
    encoder: services.encoder,
    outputPath,
    signal,
    onProgress: (done, total) => rendering.update(done, total),
  }).finally(() => rendering.stop())
  reporter.log(`Tour video created: ${outputPath}`)

  return {
    address,
    outputPath,
    center,
    seed,
    routeLength: route.length,
    waypoints: route.points.length,
    gaps,
    stats,
  }
}

export function defaultOutputPath(address: string, outputDir: string): string {
  return join(outputDir, `${safeFileName(address)}.mp4`)
}

/** One address per line; blank lines and lines starting with `#` are skipped */
export async function readAddressFile(filename: string): Promise<string[]> {
  let text: string
  try {
    text = await readFile(filename, 'utf-8')
  } catch (e) {
    throw new InputError(`Address file not found: ${filename}`, { cause: e })
  }
  const addresses = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
  if (addresses.length === 0) throw new InputError(`No addresses found in ${filename}`)
  return addresses
}

export type BatchEntry =
  | { address: string; outputPath: string }
  | { address: string; error: { category: string; message: string } }

/**
 * Runs addresses one after another; a failure is recorded and the batch moves on.
 * Aborting `signal` ends the whole batch instead.
 */
export async function runBatch(
  addresses: readonly string[],
  outputDir: string,
  tour: (address: string, outputPath: string) => Promise<unknown>,
  reporter: Reporter = silentReporter,
  signal?: AbortSignal,
): Promise<BatchEntry[]> {
  reporter.log(`Generating tours for ${addresses.length} addresses...`)
  const entries: BatchEntry[] = []
  const used = new Set<string>()

  for (const [i, address] of addresses.entries()) {
    signal?.throwIfAborted()
    reporter.log('')
    reporter.log(`[${i + 1}/${addresses.length}] Processing: ${address}`)
    // Distinct addresses can share a file name once sanitized
    let outputPath = defaultOutputPath(address, outputDir)
    for (let n = 2; used.has(outputPath); n++) {
      outputPath = join(outputDir, `${safeFileName(address)}-${n}.mp4`)
    }
    used.add(outputPath)

    try {
      await tour(address, outputPath)
      entries.push({ address, outputPath })
    } catch (e) {
      if (signal?.aborted) throw e
      const error = describeError(e)
      reporter.log(`  FAILED (${error.category}): ${error.message}`)
      entries.push({ address, error })
    }
  }

  reporter.log('')
  reporter.log('BATCH SUMMARY')
  const succeeded = entries.filter((entry) => 'outputPath' in entry).length
  reporter.log(`Successful: ${succeeded}/${entries.length}`)
  for (const entry of entries) {
    const status =
      'outputPath' in entry
        ? `OK: ${entry.outputPath}`
        : `FAILED: [${entry.error.category}] ${entry.error.message}`
    reporter.log(`  ${entry.address}: ${status}`)
  }
  return entries
}

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { join } from 'node:path'
import { ImageSize } from './lib/streetview.js'
import { DATA, OUTPUT } from './lib/utils.js'
import { VideoSpec } from './lib/video.js'

// Video
export const VIDEO_DURATION_SECONDS = 60
export const VIDEO_FPS = 30
export const CROSSFADE_FRAMES = 2
export const VIDEO_CODEC = 'libx264'

// Walk
export const SIMULATED_WALK_MINUTES = 60
export const WALKING_PACE_METERS_PER_MIN = 80
export const TARGET_ROUTE_METERS = SIMULATED_WALK_MINUTES * WALKING_PACE_METERS_PER_MIN
export const SAMPLE_INTERVAL_METERS = 10
export const DEFAULT_RADIUS_METERS = 800

// Imagery
export const STREETVIEW_SIZE: ImageSize = { width: 640, height: 480 }
export const STREETVIEW_FOV = 100
export const STREETVIEW_PITCH = 5
export const FALLBACK_ZOOM = 18
export const FETCH_CONCURRENCY = 8

/** Everything a single tour needs besides its providers */
export interface TourSettings {
  radius: number
  targetLength: number
  interval: number
  walkingPace: number
  fov: number
  pitch: number
  fallbackZoom: number
  concurrency: number
  outputDir: string
  video: VideoSpec
}

export interface Config extends TourSettings {
  googleApiKey: string
  orsApiKey?: string
  socksProxy?: string
  /** Holds the image cache and the response database; undefined disables both */
  cacheDir?: string
}

/** Missing or malformed configuration, reported before any work starts */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export const DEFAULT_SETTINGS: TourSettings = {
  radius: DEFAULT_RADIUS_METERS,
  targetLength: TARGET_ROUTE_METERS,
  interval: SAMPLE_INTERVAL_METERS,
  walkingPace: WALKING_PACE_METERS_PER_MIN,
  fov: STREETVIEW_FOV,
  pitch: STREETVIEW_PITCH,
  fallbackZoom: FALLBACK_ZOOM,
  concurrency: FETCH_CONCURRENCY,
  outputDir: OUTPUT,
  video: {
    ...STREETVIEW_SIZE,
    duration: VIDEO_DURATION_SECONDS,
    fps: VIDEO_FPS,
    crossfade: CROSSFADE_FRAMES,
    codec: VIDEO_CODEC,
    overlay: { streetName: true, distance: true, progressBar: true },
  },
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  { cache = true }: { cache?: boolean } = {},
): Config {
  const googleApiKey = env.GOOGLE_API_KEY?.trim()
  if (!googleApiKey) {
    throw new ConfigurationError('Set the GOOGLE_API_KEY environment variable')
  }
  return {
    ...DEFAULT_SETTINGS,
    outputDir: env.FLYTHROUGH_OUTPUT_DIR || DEFAULT_SETTINGS.outputDir,
    googleApiKey,
    orsApiKey: env.ORS_API_KEY?.trim() || undefined,
    socksProxy: env.SOCKS_PROXY?.trim() || undefined,
    cacheDir: cache ? env.FLYTHROUGH_CACHE_DIR || join(DATA, 'cache') : undefined,
  }
}

/** Parses a positive number given on the command line */
export function parsePositive(name: string, text: string | undefined): number | undefined {
  if (text === undefined) return undefined
  const value = Number(text)
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got "${text}"`)
  }
  return value
}

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { FetchClient } from './client.js'
import { ResponseDatabase, rememberResponse } from './database.js'
import { ProviderError } from './errors.js'
import { GeoPoint } from './geo.js'
import { asNumber, asString, dig } from './utils.js'

export interface ImageSize {
  width: number
  height: number
}

export interface PanoramaView extends ImageSize {
  /** (0, 90, 180, 270) = (north, east, south, west) */
  heading: number
  /** Degrees above the horizon */
  pitch: number
  /** Horizontal field of view in degrees */
  fov: number
}

export interface PanoramaAvailability {
  available: boolean
  panoId?: string
  date?: string
}

export interface PanoramaProvider {
  metadata(point: GeoPoint): Promise<PanoramaAvailability>
  fetchImage(point: GeoPoint, view: PanoramaView): Promise<Buffer>
}

export interface FallbackImageProvider {
  fetchImage(point: GeoPoint, size: ImageSize): Promise<Buffer>
}

export interface GoogleProviderOptions {
  apiKey: string
  client: FetchClient
  db?: ResponseDatabase
}

const STREETVIEW_URL = 'https://maps.googleapis.com/maps/api/streetview'
const STATICMAP_URL = 'https://maps.googleapis.com/maps/api/staticmap'

/** Statuses that describe the location rather than a failed request */
const ANSWERED_STATUSES = new Set(['OK', 'ZERO_RESULTS', 'NOT_FOUND'])

/** Street View Static API: a metadata lookup is free, the image is not */
export class StreetViewProvider implements PanoramaProvider {
  constructor(private options: GoogleProviderOptions) {}

  async metadata(point: GeoPoint): Promise<PanoramaAvailability> {
    const { apiKey, client, db } = this.options
    const location = formatLocation(point)
    const response = await rememberResponse(db, 'panorama-metadata', { location }, async () => {
      const url = `${STREETVIEW_URL}/metadata?${new URLSearchParams({ location, key: apiKey })}`
      const data: unknown = JSON.parse(await client.getText(url))
      const status = asString(dig(data, 'status')) ?? 'UNKNOWN'
      if (!ANSWERED_STATUSES.has(status)) {
        throw new ProviderError(`Street View metadata lookup failed: ${status}`, {
          transient: status === 'OVER_QUERY_LIMIT' || status === 'UNKNOWN_ERROR',
        })
      }
      return data
    })
    return parseMetadata(response)
  }

  async fetchImage(point: GeoPoint, view: PanoramaView): Promise<Buffer> {
    const params = new URLSearchParams({
      location: formatLocation(point),
      size: `${view.width}x${view.height}`,
      heading: view.heading.toFixed(1),
      pitch: String(view.pitch),
      fov: String(view.fov),
      source: 'outdoor',
      key: this.options.apiKey,
    })
    return this.options.client.getBuffer(`${STREETVIEW_URL}?${params}`)
  }
}

export function parseMetadata(response: unknown): PanoramaAvailability {
  if (asString(dig(response, 'status')) !== 'OK') return { available: false }
  return {
    available: true,
    panoId: asString(dig(response, 'pano_id')),
    date: asString(dig(response, 'date')),
  }
}

/** Maps Static API satellite tile centred on the point */
export class SatelliteMapProvider implements FallbackImageProvider {
  constructor(
    private options: GoogleProviderOptions,
    private zoom = 18,
  ) {}

  async fetchImage(point: GeoPoint, size: ImageSize): Promise<Buffer> {
    const params = new URLSearchParams({
      center: formatLocation(point),
      zoom: String(this.zoom),
      size: `${size.width}x${size.height}`,
      maptype: 'satellite',
      key: this.options.apiKey,
    })
    return this.options.client.getBuffer(`${STATICMAP_URL}?${params}`)
  }
}

/** Six decimals is ~10cm, plenty for a lookup key */
export function formatLocation(point: GeoPoint): string {
  return `${point.lat.toFixed(6)},${point.lng.toFixed(6)}`
}

export function pointFromJson(value: unknown): GeoPoint | null {
  const lat = asNumber(dig(value, 'lat'))
  const lng = asNumber(dig(value, 'lng'))
  return lat === undefined || lng === undefined ? null : { lat, lng }
}

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import dedent from 'dedent'
import { FetchClient } from './client.js'
import { ResponseDatabase, rememberResponse } from './database.js'
import { ProviderError } from './errors.js'
import { distance, GeoPoint, normalizeLongitude } from './geo.js'
import { RawSegment } from './graph.js'
import { formatLocation } from './streetview.js'
import { asArray, asNumber, asString, dig, isRecord } from './utils.js'

export interface StreetDataProvider {
  /** Walkable street polylines within `radius` meters of `center` */
  fetchSegments(center: GeoPoint, radius: number): Promise<RawSegment[]>
}

const OVERPASS_URL = 'https://overpass-api.de/api/interpreter'
const WALKABLE_HIGHWAYS = [
  'footway',
  'pedestrian',
  'path',
  'living_street',
  'residential',
  'unclassified',
  'tertiary',
  'secondary',
]
const POI_KEYS = ['amenity', 'shop', 'tourism', 'historic', 'leisure']

export interface OverpassOptions {
  client: FetchClient
  db?: ResponseDatabase
  /** Smallest radius tried when the server gives up on a large query */
  minimumRadius?: number
  /** Points of interest closer than this to a street count toward its interest */
  interestRadius?: number
  onWarning?: (message: string) => void
}

export class OverpassStreets implements StreetDataProvider {
  constructor(private options: OverpassOptions) {}

  async fetchSegments(center: GeoPoint, radius: number): Promise<RawSegment[]> {
    const { client, db, minimumRadius = 400, interestRadius = 30, onWarning } = this.options
    let current = Math.round(radius)
    while (true) {
      try {
        const query = overpassQuery(center, current)
        const response = await rememberResponse(
          db,
          'streets',
          { center: formatLocation(center), radius: current },
          async () => {
            const text = await client.getText(OVERPASS_URL, {
              method: 'POST',
              headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
              body: new URLSearchParams({ data: query }).toString(),
            })
            const data: unknown = JSON.parse(text)
            // Timeouts and memory limits still answer 200, with partial or no elements
            const remark = asString(dig(data, 'remark'))
            if (remark?.startsWith('runtime error')) {
              throw new ProviderError(`Street query failed: ${remark}`, { transient: true })
            }
            return data
          },
        )
        const { segments, pois } = parseOverpass(response)
        return scoreInterest(segments, pois, interestRadius)
      } catch (e) {
        // Large areas time out on busy servers; a smaller area is better than none
        if (!(e instanceof ProviderError) || current / 2 < minimumRadius) throw e
        onWarning?.(`Street query with ${current}m radius failed, trying ${current >> 1}m`)
        current >>= 1
      }
    }
  }
}

export function overpassQuery(center: GeoPoint, radius: number): string {
  const around = `(around:${radius},${center.lat},${center.lng})`
  const highways = WALKABLE_HIGHWAYS.join('|')
  return dedent`
    [out:json][timeout:60];
    way["highway"~"^(${highways})$"]${around}->.streets;
    .streets out body;
    .streets >;
    out skel qt;
    (
      ${POI_KEYS.map((key) => `node["${key}"]${around};`).join(' ')}
    );
    out body qt;
  `
}

export function parseOverpass(response: unknown): { segments: RawSegment[]; pois: GeoPoint[] } {
  const nodes = new Map<number, GeoPoint>()
  const pois: GeoPoint[] = []
  const elements = asArray(dig(response, 'elements'))

  for (const element of elements) {
    if (dig(element, 'type') !== 'node') continue
    const id = asNumber(dig(element, 'id'))
    const lat = asNumber(dig(element, 'lat'))
    const lng = asNumber(dig(element, 'lon'))
    if (id === undefined || lat === undefined || lng === undefined) continue
    nodes.set(id, { lat, lng })
    const tags = dig(element, 'tags')
    if (isRecord(tags) && POI_KEYS.some((key) => key in tags)) pois.push({ lat, lng })
  }

  const segments: RawSegment[] = []
  for (const element of elements) {
    if (dig(element, 'type') !== 'way') continue
    const coords: GeoPoint[] = []
    for (const ref of asArray(dig(element, 'nodes'))) {
      const node = nodes.get(asNumber(ref) ?? NaN)
      if (node) coords.push(node)
    }
    if (coords.length < 2) continue
    segments.push({
      id: `way/${asNumber(dig(element, 'id')) ?? segments.length}`,
      coords,
      name: asString(dig(element, 'tags', 'name')),
      highway: asString(dig(element, 'tags', 'highway')),
    })
  }

  return { segments, pois }
}

/** Counts the points of interest within `radius` meters of one of each segment's vertices */
export function scoreInterest(
  segments: readonly RawSegment[],
  pois: readonly GeoPoint[],
  radius: number,
): RawSegment[] {
  // Square cells in degrees; columns wrap around the antimeridian
  const cell = radius / 111_320
  const columns = Math.ceil(360 / cell)
  const rowOf = (lat: number) => Math.floor(lat / cell)
  const columnOf = (lng: number) => Math.floor((normalizeLongitude(lng) + 180) / cell)
  const keyOf = (row: number, column: number) =>
    `${row},${((column % columns) + columns) % columns}`
  const grid = new Map<string, number[]>()
  pois.forEach((poi, i) => {
    const key = keyOf(rowOf(poi.lat), columnOf(poi.lng))
    const bucket = grid.get(key)
    if (bucket) bucket.push(i)
    else grid.set(key, [i])
  })

  return segments.map((segment) => {
    const near = new Set<number>()
    for (const vertex of segment.coords) {
      // One extra column each way for the narrower last column at the antimeridian
      const lngSpan = Math.ceil(1 / Math.max(0.01, Math.cos((vertex.lat * Math.PI) / 180))) + 1
      const row = rowOf(vertex.lat)
      const column = columnOf(vertex.lng)
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -lngSpan; dx <= lngSpan; dx++) {
          for (const i of grid.get(keyOf(row + dy, column + dx)) ?? []) {
            if (!near.has(i) && distance(vertex, pois[i]) <= radius) near.add(i)
          }
        }
      }
    }
    return { ...segment, interest: near.size }
  })
}

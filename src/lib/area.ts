// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { distance, distinctVertexCount, GeoPoint, pointInArea, WalkableArea } from './geo.js'

export interface WalkableAreaProvider {
  /** Ring reachable on foot within `minutes`, or null when the service cannot answer */
  isochrone(center: GeoPoint, minutes: number): Promise<GeoPoint[] | null>
}

export interface ResolveAreaOptions {
  /** Total route length in meters */
  targetLength: number
  /** Disk radius used when no isochrone is available */
  radius: number
  /** Meters per minute */
  walkingPace: number
  provider?: WalkableAreaProvider
  onWarning?: (message: string) => void
}

export async function resolveWalkableArea(
  center: GeoPoint,
  { targetLength, radius, walkingPace, provider, onWarning }: ResolveAreaOptions,
): Promise<WalkableArea> {
  const disk: WalkableArea = { kind: 'disk', center, radius }
  if (!provider) return disk

  // A wander roughly doubles back, so half the route is enough reach
  const minutes = Math.max(1, Math.round(targetLength / 2 / walkingPace))
  let ring: GeoPoint[] | null
  try {
    ring = await provider.isochrone(center, minutes)
  } catch (e) {
    onWarning?.(`Isochrone lookup failed (${e instanceof Error ? e.message : e}), using disk`)
    return disk
  }
  if (!ring) return disk

  const polygon: WalkableArea = { kind: 'polygon', ring }
  if (distinctVertexCount(ring) < 3 || !pointInArea(center, polygon)) {
    onWarning?.('Isochrone polygon is degenerate, using disk')
    return disk
  }
  return polygon
}

/** Radius around `center` that covers the whole area, inflated by `buffer` */
export function queryRadius(area: WalkableArea, center: GeoPoint, buffer = 0.1): number {
  const extent =
    area.kind === 'disk'
      ? distance(center, area.center) + area.radius
      : area.ring.reduce((max, p) => Math.max(max, distance(center, p)), 0)
  return Math.ceil(extent * (1 + buffer))
}

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

export interface GeoPoint {
  readonly lat: number
  readonly lng: number
}

export type WalkableArea =
  | { readonly kind: 'disk'; readonly center: GeoPoint; readonly radius: number }
  | { readonly kind: 'polygon'; readonly ring: readonly GeoPoint[] }

const EARTH_RADIUS = 6371008.8 // Mean radius (IUGG)
const RAD = Math.PI / 180
const DEG = 180 / Math.PI
const METERS_PER_DEGREE = EARTH_RADIUS * RAD

/** Wrap into [-180, 180) */
export function normalizeLongitude(lng: number): number {
  return ((((lng + 180) % 360) + 360) % 360) - 180
}

/** https://en.wikipedia.org/wiki/Haversine_formula */
export function distance(a: GeoPoint, b: GeoPoint): number {
  const lat1 = a.lat * RAD
  const lat2 = b.lat * RAD
  const dLat = lat2 - lat1
  const dLng = (b.lng - a.lng) * RAD
  const inner = Math.sin(dLat / 2) ** 2 + Math.sin(dLng / 2) ** 2 * Math.cos(lat1) * Math.cos(lat2)
  return 2 * EARTH_RADIUS * Math.asin(Math.sqrt(Math.min(1, inner)))
}

/**
 * Initial compass bearing from `a` to `b`.
 * (0, 90, 180, 270) = (north, east, south, west). Meaningless when `a` equals `b`.
 */
export function bearing(a: GeoPoint, b: GeoPoint): number {
  const lat1 = a.lat * RAD
  const lat2 = b.lat * RAD
  const dLng = (b.lng - a.lng) * RAD
  const x = Math.sin(dLng) * Math.cos(lat2)
  const y = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng)
  return (Math.atan2(x, y) * DEG + 360) % 360
}

export function destination(from: GeoPoint, heading: number, meters: number): GeoPoint {
  const delta = meters / EARTH_RADIUS
  const theta = heading * RAD
  const lat1 = from.lat * RAD
  const lng1 = from.lng * RAD
  const sinLat2 =
    Math.sin(lat1) * Math.cos(delta) + Math.cos(lat1) * Math.sin(delta) * Math.cos(theta)
  const lat2 = Math.asin(Math.max(-1, Math.min(1, sinLat2)))
  const lng2 =
    lng1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(delta) * Math.cos(lat1),
      Math.cos(delta) - Math.sin(lat1) * Math.sin(lat2),
    )
  return { lat: lat2 * DEG, lng: normalizeLongitude(lng2 * DEG) }
}

/** Point at `fraction` of the way from `a` to `b` along the great circle */
export function interpolate(a: GeoPoint, b: GeoPoint, fraction: number): GeoPoint {
  if (fraction <= 0) return a
  if (fraction >= 1) return b
  const total = distance(a, b)
  if (total === 0) return a
  return destination(a, bearing(a, b), total * fraction)
}

export function pointInArea(p: GeoPoint, area: WalkableArea): boolean {
  switch (area.kind) {
    case 'disk':
      return distance(p, area.center) <= area.radius
    case 'polygon':
      return pointInRing(p, area.ring)
  }
}

/**
 * Ray casting. Each ring longitude is unwrapped relative to the previous vertex and the
 * test point relative to the first, so rings crossing the antimeridian stay contiguous.
 */
function pointInRing(p: GeoPoint, ring: readonly GeoPoint[]): boolean {
  if (ring.length === 0) return false
  const lngs: number[] = [ring[0].lng]
  for (let i = 1; i < ring.length; i++) {
    lngs.push(lngs[i - 1] + normalizeLongitude(ring[i].lng - ring[i - 1].lng))
  }
  const x = ring[0].lng + normalizeLongitude(p.lng - ring[0].lng)
  let inside = false
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const latI = ring[i].lat
    const latJ = ring[j].lat
    if (latI > p.lat !== latJ > p.lat) {
      const crossing = lngs[i] + ((p.lat - latI) * (lngs[j] - lngs[i])) / (latJ - latI)
      if (x < crossing) inside = !inside
    }
  }
  return inside
}

/** Whether the straight segment from `a` to `b` touches the area anywhere */
export function segmentIntersectsArea(a: GeoPoint, b: GeoPoint, area: WalkableArea): boolean {
  if (pointInArea(a, area) || pointInArea(b, area)) return true
  switch (area.kind) {
    case 'disk': {
      // Equirectangular around the centre; street segments are short
      const scale = Math.cos(area.center.lat * RAD)
      const project = (p: GeoPoint) => ({
        x: normalizeLongitude(p.lng - area.center.lng) * scale * METERS_PER_DEGREE,
        y: (p.lat - area.center.lat) * METERS_PER_DEGREE,
      })
      const pa = project(a)
      const pb = project(b)
      const dx = pb.x - pa.x
      const dy = pb.y - pa.y
      const lengthSquared = dx * dx + dy * dy
      const t =
        lengthSquared > 0 ? Math.min(1, Math.max(0, -(pa.x * dx + pa.y * dy) / lengthSquared)) : 0
      return Math.hypot(pa.x + t * dx, pa.y + t * dy) <= area.radius
    }
    case 'polygon': {
      const { ring } = area
      if (ring.length < 2) return false
      // Both ends are outside, so the segment enters the polygon only by crossing its boundary
      const origin = ring[0].lng
      const pa = { x: origin + normalizeLongitude(a.lng - origin), y: a.lat }
      const pb = { x: pa.x + normalizeLongitude(b.lng - a.lng), y: b.lat }
      let previous = { x: origin, y: ring[0].lat }
      for (let i = 1; i < ring.length; i++) {
        const current = {
          x: previous.x + normalizeLongitude(ring[i].lng - ring[i - 1].lng),
          y: ring[i].lat,
        }
        if (segmentsCross(pa, pb, previous, current)) return true
        previous = current
      }
      return false
    }
  }
}

interface PlanePoint {
  x: number
  y: number
}

function segmentsCross(p1: PlanePoint, p2: PlanePoint, q1: PlanePoint, q2: PlanePoint) {
  const side = (o: PlanePoint, a: PlanePoint, b: PlanePoint) =>
    (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x)
  const d1 = side(q1, q2, p1)
  const d2 = side(q1, q2, p2)
  const d3 = side(p1, p2, q1)
  const d4 = side(p1, p2, q2)
  if (d1 === 0 && d2 === 0) return false
  return d1 * d2 <= 0 && d3 * d4 <= 0
}

export function distinctVertexCount(ring: readonly GeoPoint[]): number {
  return new Set(ring.map((p) => `${p.lat},${normalizeLongitude(p.lng)}`)).size
}

export function polylineLength(coords: readonly GeoPoint[]): number {
  let total = 0
  for (let i = 1; i < coords.length; i++) total += distance(coords[i - 1], coords[i])
  return total
}

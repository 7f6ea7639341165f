// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { WalkableAreaProvider } from './area.js'
import { FetchClient } from './client.js'
import { ResponseDatabase, rememberResponse } from './database.js'
import { GeoPoint } from './geo.js'
import { asArray, asNumber, dig } from './utils.js'

const ISOCHRONE_URL = 'https://api.openrouteservice.org/v2/isochrones/foot-walking'

/** OpenRouteService walking isochrones */
export class OpenRouteServiceIsochrones implements WalkableAreaProvider {
  constructor(private options: { apiKey: string; client: FetchClient; db?: ResponseDatabase }) {}

  async isochrone(center: GeoPoint, minutes: number): Promise<GeoPoint[] | null> {
    const { apiKey, client, db } = this.options
    // ORS takes [lng, lat]
    const body = {
      locations: [[center.lng, center.lat]],
      range: [minutes * 60],
      range_type: 'time',
    }
    const response = await rememberResponse(db, 'isochrone', body, async () => {
      const text = await client.getText(ISOCHRONE_URL, {
        method: 'POST',
        headers: { Authorization: apiKey, 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      })
      const data: unknown = JSON.parse(text)
      return data
    })
    return parseIsochrone(response)
  }
}

/** Outer ring of the first feature, or null when the response has none */
export function parseIsochrone(response: unknown): GeoPoint[] | null {
  const ring: GeoPoint[] = []
  for (const position of asArray(dig(response, 'features', 0, 'geometry', 'coordinates', 0))) {
    const lng = asNumber(dig(position, 0))
    const lat = asNumber(dig(position, 1))
    if (lat !== undefined && lng !== undefined) ring.push({ lat, lng })
  }
  return ring.length > 0 ? ring : null
}

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { rememberResponse } from './database.js'
import { InputError, ProviderError } from './errors.js'
import { GeoPoint } from './geo.js'
import { formatLocation, GoogleProviderOptions, pointFromJson } from './streetview.js'
import { asArray, asString, dig } from './utils.js'

export interface Geocoder {
  /** Throws InputError when the address cannot be found */
  resolveAddress(text: string): Promise<GeoPoint>
}

export interface ReverseGeocoder {
  /** Street name, or the formatted address when no street is known */
  reverseGeocode(point: GeoPoint): Promise<string | null>
}

const GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json'

export class GoogleGeocoder implements Geocoder, ReverseGeocoder {
  constructor(private options: GoogleProviderOptions) {}

  async resolveAddress(text: string): Promise<GeoPoint> {
    const address = text.trim()
    if (!address) throw new InputError('Address is empty')
    const response = await this.lookup('geocode', { address })
    const status = asString(dig(response, 'status'))
    if (status !== 'OK') {
      throw new InputError(`Could not geocode "${address}": ${status ?? 'no status'}`)
    }
    const point = pointFromJson(dig(response, 'results', 0, 'geometry', 'location'))
    if (!point) throw new InputError(`Geocoding "${address}" returned no location`)
    return point
  }

  async reverseGeocode(point: GeoPoint): Promise<string | null> {
    const response = await this.lookup('reverse-geocode', { latlng: formatLocation(point) })
    return parseReverseGeocode(response)
  }

  private lookup(kind: 'geocode' | 'reverse-geocode', request: Record<string, string>) {
    const { apiKey, client, db } = this.options
    return rememberResponse(db, kind, request, async () => {
      const url = `${GEOCODE_URL}?${new URLSearchParams({ ...request, key: apiKey })}`
      const data: unknown = JSON.parse(await client.getText(url))
      const status = asString(dig(data, 'status'))
      // Only definite answers are worth remembering
      if (status !== 'OK' && status !== 'ZERO_RESULTS') {
        throw new ProviderError(`Geocoding request failed: ${status ?? 'no status'}`, {
          transient: status === 'OVER_QUERY_LIMIT' || status === 'UNKNOWN_ERROR',
        })
      }
      return data
    })
  }
}

export function parseReverseGeocode(response: unknown): string | null {
  if (asString(dig(response, 'status')) !== 'OK') return null
  const results = asArray(dig(response, 'results'))
  for (const result of results) {
    for (const component of asArray(dig(result, 'address_components'))) {
      if (asArray(dig(component, 'types')).includes('route')) {
        const name = asString(dig(component, 'long_name'))
        if (name) return name
      }
    }
  }
  return asString(dig(results[0], 'formatted_address')) ?? null
}

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import {
  ConfigurationError,
  DEFAULT_SETTINGS,
  loadConfig,
  parsePositive,
  TARGET_ROUTE_METERS,
} from '../src/config.js'
import { DATA } from '../src/lib/utils.js'

describe('loadConfig', () => {
  it('requires a Google API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError)
    expect(() => loadConfig({ GOOGLE_API_KEY: '  ' })).toThrow(
      'Set the GOOGLE_API_KEY environment variable',
    )
  })

  it('starts from the defaults', () => {
    const config = loadConfig({ GOOGLE_API_KEY: ' test-secret ' })
    expect(config).toMatchObject({
      googleApiKey: 'test-secret',
      orsApiKey: undefined,
      socksProxy: undefined,
      cacheDir: join(DATA, 'cache'),
      outputDir: DEFAULT_SETTINGS.outputDir,
      targetLength: 4800,
    })
    expect(config.video).toMatchObject({ width: 640, height: 480, duration: 60, fps: 30 })
  })

  it('reads optional settings from the environment', () => {
    const config = loadConfig({
      GOOGLE_API_KEY: 'test-secret',
      ORS_API_KEY: 'test-ors-secret',
      SOCKS_PROXY: 'socks5h://localhost:9050',
      FLYTHROUGH_CACHE_DIR: '/tmp/flythrough-cache',
      FLYTHROUGH_OUTPUT_DIR: '/tmp/flythrough-videos',
    })
    expect(config).toMatchObject({
      orsApiKey: 'test-ors-secret',
      socksProxy: 'socks5h://localhost:9050',
      cacheDir: '/tmp/flythrough-cache',
      outputDir: '/tmp/flythrough-videos',
    })
  })

  it('can run without a cache', () => {
    const env = { GOOGLE_API_KEY: 'test-secret', FLYTHROUGH_CACHE_DIR: '/tmp/cache' }
    expect(loadConfig(env, { cache: false }).cacheDir).toBeUndefined()
  })

  it('walks for an hour at 80 meters a minute', () => {
    expect(TARGET_ROUTE_METERS).toBe(4800)
  })
})

describe('parsePositive', () => {
  it('accepts positive numbers', () => {
    expect(parsePositive('--radius', '500')).toBe(500)
    expect(parsePositive('--radius', '0.5')).toBe(0.5)
    expect(parsePositive('--radius', undefined)).toBeUndefined()
  })

  it('rejects anything else', () => {
    expect(() => parsePositive('--radius', '0')).toThrow(
      new ConfigurationError('--radius must be a positive number, got "0"'),
    )
    expect(() => parsePositive('--radius', 'far')).toThrow(ConfigurationError)
    expect(() => parsePositive('--radius', '-5')).toThrow(ConfigurationError)
  })
})

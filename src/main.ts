#!/usr/bin/env node
// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import dedent from 'dedent'
import { parseArgs } from 'node:util'
import { ConfigurationError, DEFAULT_RADIUS_METERS, loadConfig, parsePositive } from './config.js'
import { describeError } from './lib/errors.js'
import { consoleReporter, createServices, generateTour, readAddressFile, runBatch } from './tour.js'

const USAGE = dedent`
  Usage:
    flythrough <address> [--output file.mp4] [--radius meters] [--seed n]
    flythrough --batch addresses.txt [--output-dir dir]

  Options:
    -o, --output      Output video path (default: output/<address>.mp4)
    -r, --radius      Max distance from the address in meters (default: ${DEFAULT_RADIUS_METERS})
    -s, --seed        Route seed (default: derived from the address)
    -b, --batch       Text file with one address per line
        --output-dir  Output directory for batch mode
        --no-cache    Do not read or write the on-disk cache
    -h, --help        Show this help

  Environment:
    GOOGLE_API_KEY         Geocoding, Street View and Static Maps (required)
    ORS_API_KEY            OpenRouteService walking isochrones (optional)
    FLYTHROUGH_CACHE_DIR   Cache directory (default: data/cache)
    FLYTHROUGH_OUTPUT_DIR  Output directory (default: output)
    SOCKS_PROXY            e.g. socks5h://localhost:9050
`

function parseSeed(text: string | undefined): number | undefined {
  if (text === undefined) return undefined
  const seed = Number(text)
  if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    throw new ConfigurationError(`--seed must be an integer between 0 and ${0xffffffff}`)
  }
  return seed
}

async function run(argv: string[], signal: AbortSignal): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      radius: { type: 'string', short: 'r' },
      seed: { type: 'string', short: 's' },
      batch: { type: 'string', short: 'b' },
      'output-dir': { type: 'string' },
      'no-cache': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  if (values.help) {
    console.log(USAGE)
    return 0
  }
  const address = positionals.join(' ').trim()
  if (!values.batch && !address) throw new ConfigurationError('Give an address or --batch file')
  if (values.batch && address) throw new ConfigurationError('Give either an address or --batch')

  const radius = parsePositive('--radius', values.radius)
  const seed = parseSeed(values.seed)
  const config = loadConfig(process.env, { cache: !values['no-cache'] })
  const { services, close } = createServices(config, consoleReporter)

  try {
    if (values.batch) {
      const addresses = await readAddressFile(values.batch)
      const outputDir = values['output-dir'] ?? config.outputDir
      const entries = await runBatch(
        addresses,
        outputDir,
        (address, outputPath) =>
          generateTour(
            { address, outputPath, radius, seed, signal },
            config,
            services,
            consoleReporter,
          ),
        consoleReporter,
        signal,
      )
      return entries.every((entry) => 'outputPath' in entry) ? 0 : 1
    }

    await generateTour(
      { address, outputPath: values.output, radius, seed, signal },
      config,
      services,
      consoleReporter,
    )
    return 0
  } finally {
    close()
  }
}

// The first Ctrl-C stops work and removes partial output; the default handler takes a second one
const controller = new AbortController()
process.once('SIGINT', () => {
  console.error('Interrupted, cleaning up...')
  controller.abort()
})

let exitCode: number
try {
  exitCode = await run(process.argv.slice(2), controller.signal)
} catch (e) {
  if (controller.signal.aborted) {
    console.error('Interrupted')
    exitCode = 130
  } else if (e instanceof ConfigurationError || (e instanceof TypeError && 'code' in e)) {
    // parseArgs reports unknown or malformed options as a TypeError with an ERR_PARSE_ARGS code
    console.error(`Error: ${e.message}`)
    console.error()
    console.error(USAGE)
    exitCode = 2
  } else {
    const { category, message } = describeError(e)
    console.error(`${category}: ${message}`)
    exitCode = 1
  }
}
process.exitCode = exitCode

// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

export type ErrorCategory = 'InputError' | 'CoverageError' | 'ProviderError' | 'EncodingError'

export abstract class FlythroughError extends Error {
  abstract readonly category: ErrorCategory

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The address could not be resolved to a location */
export class InputError extends FlythroughError {
  readonly category = 'InputError'
}

/** Not enough street network or imagery to build a tour */
export class CoverageError extends FlythroughError {
  readonly category = 'CoverageError'
}

export interface ProviderErrorOptions extends ErrorOptions {
  /** HTTP status, absent for network-level failures */
  status?: number
  /** Defaults to true for 429, 5xx and network failures */
  transient?: boolean
}

export class ProviderError extends FlythroughError {
  readonly category = 'ProviderError'
  readonly status?: number
  readonly transient: boolean

  constructor(message: string, { status, transient, ...options }: ProviderErrorOptions = {}) {
    super(message, options)
    this.status = status
    this.transient = transient ?? (status === undefined || status === 429 || status >= 500)
  }
}

export class EncodingError extends FlythroughError {
  readonly category = 'EncodingError'
}

export function describeError(error: unknown): { category: string; message: string } {
  if (error instanceof FlythroughError) return { category: error.category, message: error.message }
  if (error instanceof Error) return { category: 'UnexpectedError', message: error.message }
  return { category: 'UnexpectedError', message: String(error) }
}

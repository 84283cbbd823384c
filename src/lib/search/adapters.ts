// Jurisdiction → source adapter dispatch table

import type { AppConfig } from '../config'
import type { SourceAdapter, SupportedJurisdiction } from '../patents/types'
import { EPOClient } from './epo'
import { USPTOClient } from './uspto'

export type AdapterRegistry = Readonly<Record<SupportedJurisdiction, SourceAdapter>>

/**
 * One adapter per supported jurisdiction: EP → EPO, US → USPTO
 */
export function createAdapterRegistry(config: AppConfig, now?: () => Date): AdapterRegistry {
  return Object.freeze({
    EP: new EPOClient({
      consumerKey: config.epo.consumerKey,
      consumerSecret: config.epo.consumerSecret,
      baseUrl: config.epo.baseUrl,
      timeoutMs: config.requestTimeoutMs,
      now,
    }),
    US: new USPTOClient({
      apiKey: config.uspto.apiKey,
      baseUrl: config.uspto.baseUrl,
      timeoutMs: config.requestTimeoutMs,
      now,
    }),
  })
}

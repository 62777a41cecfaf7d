import type { LevelWithSilent } from 'pino'
import type { AdvancedFilter, DateFilter } from './filter.types.js'

export type FeedMode = 'url' | 'top' | 'topic'

export type LogDestination = 'terminal' | 'file' | 'both'

export interface FeedConfig {
  mode: FeedMode
  /** Explicit feed URL, used in 'url' mode */
  rssUrl?: string
  /** Two-letter country code for 'top' mode */
  country: string
  /** Topic keyword from the topic table, used in 'topic' mode */
  topicKeyword?: string
  /** Query string appended to the topic URL, e.g. ?hl=en-US&gl=US&ceid=US%3Aen */
  topicParams: string
}

export interface DiscordConfig {
  webhookUrl: string
  avatarUrl?: string
  username?: string
}

/**
 * Resolved configuration for one run. Built once before any I/O and never
 * mutated afterwards.
 */
export interface RunConfig {
  feed: FeedConfig
  discord: DiscordConfig
  initialize: boolean
  advancedFilter: AdvancedFilter | null
  dateFilter: DateFilter | null
  originLink: boolean
  dbPath: string
  logLevel: LevelWithSilent
  logDestination: LogDestination
  fetchTimeoutMs: number
  webhookTimeoutMs: number
  deliveryDelayMs: number
  retryDelayMs: number
}

/**
 * Run configuration
 *
 * Reads the environment once, validates it with zod and compiles the
 * filter expressions, so every configuration mistake surfaces before the
 * first network or file access.
 */

import { z } from 'zod'
import type { RunConfig } from '../types/config.types.js'
import { ConfigError } from '../types/errors.js'
import { parseAdvancedFilter } from '../services/filter/advanced-filter.js'
import { parseDateFilter } from '../services/filter/date-filter.js'
import { isDiscordWebhookUrl } from '../services/notifications/channels/discord-webhook.js'
import { validLogLevels } from '../utils/logger.js'

export const DEFAULT_TOPIC_PARAMS = '?hl=ko&gl=KR&ceid=KR%3Ako'
export const DEFAULT_DB_PATH = './google_news.db'

const TRUE_VALUES = ['true', 't', '1', 'yes', 'y']
const FALSE_VALUES = ['false', 'f', '0', 'no', 'n']

/** Treats unset and blank variables alike */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

const optionalText = z.preprocess(
  blankToUndefined,
  z.string().trim().optional(),
)

const millis = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(fallback),
  )

/** Blank to undefined, anything else trimmed and lowercased */
function normalizeChoice(value: unknown): unknown {
  const blank = blankToUndefined(value)
  return typeof blank === 'string' ? blank.trim().toLowerCase() : blank
}

const EnvSchema = z.object({
  feedMode: z.preprocess(
    normalizeChoice,
    z.enum(['url', 'top', 'topic']).default('url'),
  ),
  rssUrl: optionalText,
  topCountry: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z]{2}$/, 'Must be a two-letter country code')
      .default('KR'),
  ),
  topicKeyword: optionalText,
  topicParams: z.preprocess(
    blankToUndefined,
    z.string().trim().default(DEFAULT_TOPIC_PARAMS),
  ),
  discordWebhookUrl: z.preprocess(
    blankToUndefined,
    z
      .string({ error: 'discordWebhookUrl is required' })
      .trim()
      .refine(isDiscordWebhookUrl, {
        message: 'Must be a valid Discord webhook URL',
      }),
  ),
  discordAvatarUrl: optionalText,
  discordUsername: optionalText,
  initializeMode: optionalText,
  advancedFilter: optionalText,
  dateFilter: optionalText,
  originLink: optionalText,
  dbPath: z.preprocess(blankToUndefined, z.string().default(DEFAULT_DB_PATH)),
  logLevel: z.preprocess(
    normalizeChoice,
    z.enum(validLogLevels).default('info'),
  ),
  logDestination: z.preprocess(
    normalizeChoice,
    z.enum(['terminal', 'file', 'both']).default('terminal'),
  ),
  fetchTimeoutMs: millis(30_000),
  webhookTimeoutMs: millis(10_000),
  deliveryDelayMs: millis(1_000),
  retryDelayMs: millis(5_000),
})

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Parses a flag that is off unless set to a true-ish value.
 */
export function parseEnabledFlag(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.includes(value.toLowerCase())
}

/**
 * Parses a flag that is on unless set to a false-ish value.
 */
export function parseDisabledFlag(value: string | undefined): boolean {
  return value === undefined || !FALSE_VALUES.includes(value.toLowerCase())
}

/**
 * Builds the immutable configuration for one run.
 *
 * @throws ConfigError for missing or invalid settings
 * @throws FilterError for a malformed advanced or date filter
 */
export function resolveRunConfig(
  env: Record<string, string | undefined> = process.env,
): Readonly<RunConfig> {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }

  const values = parsed.data

  if (values.feedMode === 'url') {
    if (!values.rssUrl) {
      throw new ConfigError('rssUrl is required when feedMode is "url"')
    }
    if (!isHttpUrl(values.rssUrl)) {
      throw new ConfigError('rssUrl must be an http(s) URL')
    }
  }
  if (values.feedMode === 'topic' && !values.topicKeyword) {
    throw new ConfigError('topicKeyword is required when feedMode is "topic"')
  }

  const config: RunConfig = {
    feed: Object.freeze({
      mode: values.feedMode,
      rssUrl: values.rssUrl,
      country: values.topCountry.toUpperCase(),
      topicKeyword: values.topicKeyword,
      topicParams: values.topicParams,
    }),
    discord: Object.freeze({
      webhookUrl: values.discordWebhookUrl,
      avatarUrl: values.discordAvatarUrl,
      username: values.discordUsername,
    }),
    initialize: parseEnabledFlag(values.initializeMode),
    advancedFilter: parseAdvancedFilter(values.advancedFilter),
    dateFilter: parseDateFilter(values.dateFilter),
    originLink: parseDisabledFlag(values.originLink),
    dbPath: values.dbPath,
    logLevel: values.logLevel,
    logDestination: values.logDestination,
    fetchTimeoutMs: values.fetchTimeoutMs,
    webhookTimeoutMs: values.webhookTimeoutMs,
    deliveryDelayMs: values.deliveryDelayMs,
    retryDelayMs: values.retryDelayMs,
  }

  return Object.freeze(config)
}

/**
 * Google News catalog: country editions, topic ids and the localized
 * labels used in message headers. The tables live in data/google-news.json.
 */

import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { FeedConfig } from '../../types/config.types.js'
import { ConfigError } from '../../types/errors.js'
import { readQueryParam } from '../../utils/url.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const CATALOG_PATH = resolve(
  __dirname,
  '..',
  '..',
  '..',
  'data',
  'google-news.json',
)

const GOOGLE_NEWS_RSS = 'https://news.google.com/rss'

/** Languages the topic table carries ids for */
const TOPIC_LANGUAGES = ['ko', 'en', 'ja', 'zh'] as const

const CountrySchema = z.object({
  hl: z.string(),
  ceid: z.string(),
  localName: z.string(),
  timeZone: z.string(),
})

const TopicSchema = z.object({
  names: z.record(z.string(), z.string()),
  ids: z.record(z.string(), z.string()),
})

const CategorySchema = z.object({
  labels: z.record(z.string(), z.string()),
  keywords: z.array(z.string()),
})

const CatalogSchema = z.object({
  countries: z.record(z.string(), CountrySchema),
  topics: z.record(z.string(), TopicSchema),
  categories: z.record(z.string(), CategorySchema),
  newsPrefixes: z.record(z.string(), z.string()),
  topicsLabel: z.record(z.string(), z.string()),
})

export type GoogleNewsCatalog = z.infer<typeof CatalogSchema>

/**
 * Everything a run needs to know about where its feed comes from.
 */
export interface FeedSource {
  url: string
  /** Two-letter language code used for labels, e.g. 'ko' */
  language: string
  /** Two-letter country code, or '' when the feed names none */
  country: string
  /** Header label: topic name or edition name */
  label: string
  /** Header category */
  category: string
  /** Value stored in the topic column */
  topic: string
  /** IANA zone publication dates are shown in */
  timeZone: string
}

let catalog: GoogleNewsCatalog | undefined

/**
 * Loads and validates the catalog once per process.
 *
 * @throws ConfigError when the data file is missing or malformed
 */
export function loadCatalog(): GoogleNewsCatalog {
  if (catalog) return catalog

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(CATALOG_PATH, 'utf8'))
  } catch (error) {
    throw new ConfigError(`Failed to read ${CATALOG_PATH}`, { cause: error })
  }

  const parsed = CatalogSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid Google News catalog: ${parsed.error.message}`,
    )
  }
  catalog = parsed.data
  return catalog
}

function baseLanguage(hl: string | undefined): string {
  return (hl ?? 'en').split('-')[0].toLowerCase()
}

function topicLanguage(hl: string | undefined): string {
  const language = baseLanguage(hl)
  return TOPIC_LANGUAGES.some((candidate) => candidate === language)
    ? language
    : 'en'
}

/**
 * Converts a two-letter country code into its regional indicator flag.
 *
 * @example
 * ```typescript
 * countryFlag('kr') // '🇰🇷'
 * countryFlag('')   // ''
 * ```
 */
export function countryFlag(countryCode: string): string {
  if (!/^[a-z]{2}$/i.test(countryCode)) {
    return ''
  }
  return [...countryCode.toUpperCase()]
    .map((char) => String.fromCodePoint(char.charCodeAt(0) + 127397))
    .join('')
}

/**
 * "Google News" in the feed's language.
 */
export function newsPrefix(language: string): string {
  return loadCatalog().newsPrefixes[language] ?? 'Google News'
}

/**
 * Localized category for a topic keyword.
 */
export function topicCategory(keyword: string, language: string): string {
  for (const category of Object.values(loadCatalog().categories)) {
    if (category.keywords.includes(keyword)) {
      return category.labels[language] ?? category.labels.en ?? keyword
    }
  }
  return language === 'ko' ? '기타 뉴스' : 'Other News'
}

function topicsLabel(language: string): string {
  return loadCatalog().topicsLabel[language] ?? 'Topics'
}

/**
 * Finds the topic keyword whose id (in any language) ends the URL path.
 */
export function findTopicById(
  url: string,
): { keyword: string; name: string } | undefined {
  let topicId: string | undefined
  try {
    topicId = new URL(url).pathname.split('/').pop()
  } catch {
    return undefined
  }
  if (!topicId) return undefined

  for (const [keyword, topic] of Object.entries(loadCatalog().topics)) {
    for (const [language, id] of Object.entries(topic.ids)) {
      if (id === topicId) {
        return { keyword, name: topic.names[language] ?? keyword }
      }
    }
  }
  return undefined
}

function timeZoneFor(country: string): string {
  return loadCatalog().countries[country]?.timeZone ?? 'UTC'
}

/**
 * Resolves the feed URL and header metadata for the configured mode.
 *
 * @throws ConfigError for an unknown country or topic keyword
 */
export function resolveFeedSource(feed: FeedConfig): FeedSource {
  const { countries, topics } = loadCatalog()

  switch (feed.mode) {
    case 'top': {
      const country = feed.country.toUpperCase()
      const edition = countries[country]
      if (!edition) {
        throw new ConfigError(`Unknown country code "${feed.country}"`)
      }
      const language = baseLanguage(edition.hl)
      const query = new URLSearchParams({
        hl: edition.hl,
        gl: country,
        ceid: edition.ceid,
      })
      return {
        url: `${GOOGLE_NEWS_RSS}?${query.toString()}`,
        language,
        country,
        label: edition.localName,
        category: topicCategory('headlines', language),
        topic: 'top',
        timeZone: edition.timeZone,
      }
    }

    case 'topic': {
      const keyword = feed.topicKeyword ?? ''
      const topic = topics[keyword]
      if (!topic) {
        throw new ConfigError(`Unknown topic keyword "${keyword}"`)
      }
      const language = topicLanguage(readQueryParam(feed.topicParams, 'hl'))
      const id = topic.ids[language] ?? topic.ids.en
      if (!id) {
        throw new ConfigError(`Topic "${keyword}" has no feed id`)
      }
      const country = (
        readQueryParam(feed.topicParams, 'gl') ?? 'KR'
      ).toUpperCase()
      return {
        url: `${GOOGLE_NEWS_RSS}/topics/${id}${feed.topicParams}`,
        language,
        country,
        label: topic.names[language] ?? topic.names.en ?? keyword,
        category: topicCategory(keyword, language),
        topic: keyword,
        timeZone: timeZoneFor(country),
      }
    }

    case 'url': {
      const url = feed.rssUrl ?? ''
      const language = topicLanguage(readQueryParam(url, 'hl'))
      const country = (readQueryParam(url, 'gl') ?? '').toUpperCase()
      const knownTopic = findTopicById(url)
      return {
        url,
        language,
        country,
        label: knownTopic?.name ?? countries[country]?.localName ?? 'RSS',
        category: topicsLabel(language),
        topic: knownTopic?.keyword ?? 'general',
        timeZone: timeZoneFor(country),
      }
    }
  }
}

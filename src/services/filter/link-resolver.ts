/**
 * Link Resolver
 *
 * Turns Google News aggregator links (news.google.com/rss/articles/<id>)
 * into the publisher's own URL. The id is a base64 protobuf payload that
 * usually embeds the target URL; newer ids (prefixed AU_yqL once decoded)
 * have to be exchanged through Google's batchexecute endpoint. When both
 * fail the aggregator link is requested with redirects followed.
 *
 * Resolution never throws: any failure yields the aggregator link.
 */

import type { Logger } from '../../utils/logger.js'
import { safeHostname } from '../../utils/url.js'

export const GOOGLE_NEWS_HOST = 'news.google.com'

const BATCH_EXECUTE_URL =
  'https://news.google.com/_/DotsSplashUi/data/batchexecute?rpcids=Fbv4je'

const PAYLOAD_PREFIX = '\x08\x13\x22'
const PAYLOAD_SUFFIX = '\xd2\x01\x00'
const BATCH_ID_MARKER = 'AU_yqL'
const YOUTUBE_PATTERN = /\x08 "\x0b([\w-]{11})\x98\x01\x01/
const NON_PRINTABLE = /[^\x20-\x7E]+/
const URL_PATTERN = /https?:\/\/\S+/

const BATCH_RESPONSE_HEADER = '[\\"garturlres\\",\\"'
const BATCH_RESPONSE_FOOTER = '\\",'

export interface LinkResolverDeps {
  log: Logger
  timeoutMs: number
  /** Attempts for the redirect-following fallback */
  maxAttempts?: number
}

export type GoogleNewsDecodeResult =
  | { kind: 'url'; url: string }
  | { kind: 'batchexecute'; id: string }

/**
 * Replaces \uXXXX escape sequences with the characters they encode.
 */
export function unescapeUnicode(text: string): string {
  return text.replace(/\\u([0-9a-fA-F]{4})/g, (_match, hex: string) =>
    String.fromCharCode(Number.parseInt(hex, 16)),
  )
}

/**
 * Normalizes a decoded publisher URL.
 *
 * Unicode escapes and stray backslashes left by the payload are removed,
 * percent-encoding is normalized, and MSN links keep only their id/article
 * query parameters over https.
 */
export function cleanUrl(url: string): string {
  let text = unescapeUnicode(url).replace(/\\/g, '')
  try {
    text = decodeURIComponent(text)
  } catch {
    // Malformed percent-encoding: keep the text as-is
  }

  let parsed: URL
  try {
    parsed = new URL(text)
  } catch {
    return text
  }

  if (parsed.hostname.endsWith('msn.com')) {
    parsed.protocol = 'https:'
    const kept = new URLSearchParams()
    for (const key of ['id', 'article']) {
      const value = parsed.searchParams.get(key)
      if (value !== null) kept.set(key, value)
    }
    parsed.search = kept.toString()
  }

  return parsed.toString()
}

function extractRegularUrl(decoded: string): string | undefined {
  for (const part of decoded.split(NON_PRINTABLE)) {
    const match = URL_PATTERN.exec(part)
    if (match) return match[0]
  }
  return undefined
}

/**
 * Decodes a Google News article link without any network access.
 *
 * @returns The embedded URL, a batchexecute id when the payload only holds
 * an opaque reference, or null when the link is not a decodable article link.
 */
export function decodeGoogleNewsUrl(
  sourceUrl: string,
): GoogleNewsDecodeResult | null {
  let url: URL
  try {
    url = new URL(sourceUrl)
  } catch {
    return null
  }

  const segments = url.pathname.split('/')
  if (
    url.hostname !== GOOGLE_NEWS_HOST ||
    segments.length < 2 ||
    segments[segments.length - 2] !== 'articles'
  ) {
    return null
  }

  const id = segments[segments.length - 1]
  if (id.length === 0) return null

  const raw = Buffer.from(id, 'base64').toString('latin1')

  let payload = raw
  if (payload.startsWith(PAYLOAD_PREFIX)) {
    payload = payload.slice(PAYLOAD_PREFIX.length)
  }
  if (payload.endsWith(PAYLOAD_SUFFIX)) {
    payload = payload.slice(0, -PAYLOAD_SUFFIX.length)
  }
  if (payload.length > 0) {
    // First byte is a varint length; two bytes when the high bit is set
    const length = payload.charCodeAt(0)
    payload =
      length >= 0x80
        ? payload.slice(2, length + 1)
        : payload.slice(1, length + 1)
  }

  if (payload.startsWith(BATCH_ID_MARKER)) {
    return { kind: 'batchexecute', id }
  }

  const direct = extractRegularUrl(payload)
  if (direct) {
    return { kind: 'url', url: cleanUrl(direct) }
  }

  const youtube = YOUTUBE_PATTERN.exec(raw)
  if (youtube) {
    return { kind: 'url', url: `https://www.youtube.com/watch?v=${youtube[1]}` }
  }

  const legacy = extractRegularUrl(raw)
  if (legacy) {
    return { kind: 'url', url: cleanUrl(legacy) }
  }

  return null
}

function buildBatchRequest(id: string): string {
  const inner = JSON.stringify([
    'garturlreq',
    [
      [
        'en-US',
        'US',
        ['FINANCE_TOP_INDICES', 'WEB_TEST_1_0_0'],
        null,
        null,
        1,
        1,
        'US:en',
        null,
        180,
        null,
        null,
        null,
        null,
        null,
        0,
        null,
        null,
        [1608992183, 723341000],
      ],
      'en-US',
      'US',
      1,
      [2, 3, 4, 8],
      1,
      0,
      '655000234',
      0,
      0,
      null,
      0,
    ],
    id,
  ])
  return JSON.stringify([[['Fbv4je', inner, null, 'generic']]])
}

/**
 * Exchanges an opaque article id for its publisher URL.
 *
 * @throws Error when the endpoint fails or answers in an unexpected shape
 */
export async function fetchBatchExecuteUrl(
  id: string,
  deps: LinkResolverDeps,
): Promise<string> {
  const response = await fetch(BATCH_EXECUTE_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded;charset=utf-8',
      Referer: 'https://news.google.com/',
    },
    body: new URLSearchParams({ 'f.req': buildBatchRequest(id) }),
    signal: AbortSignal.timeout(deps.timeoutMs),
  })

  if (!response.ok) {
    throw new Error(`batchexecute request failed with status ${response.status}`)
  }

  const text = await response.text()
  const headerIndex = text.indexOf(BATCH_RESPONSE_HEADER)
  if (headerIndex === -1) {
    throw new Error('batchexecute response did not contain a URL')
  }
  const rest = text.slice(headerIndex + BATCH_RESPONSE_HEADER.length)
  const footerIndex = rest.indexOf(BATCH_RESPONSE_FOOTER)
  if (footerIndex === -1) {
    throw new Error('batchexecute response was truncated')
  }
  return rest.slice(0, footerIndex)
}

async function followRedirects(
  link: string,
  deps: LinkResolverDeps,
): Promise<string | undefined> {
  const maxAttempts = deps.maxAttempts ?? 2

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const response = await fetch(link, {
        method: 'GET',
        redirect: 'follow',
        signal: AbortSignal.timeout(deps.timeoutMs),
      })
      await response.body?.cancel()

      const finalHost = safeHostname(response.url)
      if (response.ok && finalHost && finalHost !== GOOGLE_NEWS_HOST) {
        return cleanUrl(response.url)
      }
      // Google answers with its own page when it will not redirect
      if (response.ok) return undefined
    } catch (error) {
      deps.log.debug(
        { error, attempt, maxAttempts },
        'Redirect lookup for aggregator link failed',
      )
    }
  }
  return undefined
}

/**
 * Resolves an aggregator link to the publisher URL, falling back to the
 * aggregator link itself.
 */
export async function resolveOriginalUrl(
  link: string,
  deps: LinkResolverDeps,
): Promise<string> {
  if (safeHostname(link) !== GOOGLE_NEWS_HOST) {
    return link
  }

  try {
    const decoded = decodeGoogleNewsUrl(link)
    if (decoded?.kind === 'url') {
      return decoded.url
    }
    if (decoded?.kind === 'batchexecute') {
      return cleanUrl(await fetchBatchExecuteUrl(decoded.id, deps))
    }
  } catch (error) {
    deps.log.debug({ error, link }, 'Decoding aggregator link failed')
  }

  const redirected = await followRedirects(link, deps)
  if (redirected) {
    return redirected
  }

  deps.log.warn({ link }, 'Could not resolve publisher link, keeping aggregator link')
  return link
}

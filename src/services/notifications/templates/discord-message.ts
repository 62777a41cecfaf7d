/**
 * Discord Message Template
 *
 * Pure functions that render a NewsItem as webhook message content.
 */

import type { DiscordConfig } from '../../../types/config.types.js'
import {
  DISCORD_CONTENT_LIMIT,
  type DiscordWebhookPayload,
} from '../../../types/discord.types.js'
import { DeliveryError } from '../../../types/errors.js'
import type { NewsItem, RelatedArticle } from '../../../types/news.types.js'
import {
  countryFlag,
  type FeedSource,
  newsPrefix,
} from '../../feed/google-news.js'

const ELLIPSIS = '…'

/**
 * Header and presentation details shared by every message of a run.
 */
export interface MessageContext {
  prefix: string
  category: string
  label: string
  flag: string
  language: string
  timeZone: string
  username?: string
  avatarUrl?: string
}

export function createMessageContext(
  source: FeedSource,
  discord: DiscordConfig,
): MessageContext {
  return {
    prefix: newsPrefix(source.language),
    category: source.category,
    label: source.label,
    flag: countryFlag(source.country),
    language: source.language,
    timeZone: source.timeZone,
    username: discord.username,
    avatarUrl: discord.avatarUrl,
  }
}

/**
 * Formats a publication time in the given zone as
 * `YYYY-MM-DD HH:mm:ss (Zone/Name)`.
 */
export function formatPublishedAt(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date)

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '00'

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')} (${timeZone})`
}

function fullCoverageLabel(language: string): string {
  return language === 'ko'
    ? 'Google 뉴스에서 전체 콘텐츠 보기'
    : 'View Full Coverage on Google News'
}

function relatedLine(article: RelatedArticle): string {
  const press = article.press ? ` | ${article.press}` : ''
  return `- [${article.title}](<${article.link}>)${press}`
}

function renderContent(
  item: NewsItem,
  title: string,
  related: RelatedArticle[],
  context: MessageContext,
): string {
  const label = [context.label, context.flag].filter(Boolean).join(' ')
  let content = `\`${context.prefix} - ${context.category} - ${label}\`\n**${title}**\n${item.link}`

  if (related.length > 0) {
    content += `\n>>> ${related.map(relatedLine).join('\n')}`
  }
  if (item.fullCoverageLink) {
    content += `\n\n▶️ [${fullCoverageLabel(context.language)}](<${item.fullCoverageLink}>)`
  }
  if (item.pubDate) {
    content += `\n\n📅 ${formatPublishedAt(item.pubDate, context.timeZone)}`
  }
  return content
}

/**
 * Renders message content within Discord's length limit.
 *
 * Related articles are dropped from the end first, then the title is
 * shortened with an ellipsis.
 *
 * @throws DeliveryError (not retryable) when the content cannot fit without
 * cutting the link
 */
export function formatNewsContent(
  item: NewsItem,
  context: MessageContext,
): string {
  let related = item.related
  let content = renderContent(item, item.title, related, context)

  while (content.length > DISCORD_CONTENT_LIMIT && related.length > 0) {
    related = related.slice(0, -1)
    content = renderContent(item, item.title, related, context)
  }

  if (content.length > DISCORD_CONTENT_LIMIT) {
    const overflow = content.length - DISCORD_CONTENT_LIMIT
    const keep = Math.max(0, item.title.length - overflow - ELLIPSIS.length)
    content = renderContent(
      item,
      `${item.title.slice(0, keep)}${ELLIPSIS}`,
      related,
      context,
    )
  }

  // Only an oversized link can still overflow here
  if (content.length > DISCORD_CONTENT_LIMIT) {
    throw new DeliveryError(
      `Message needs ${content.length} characters, Discord allows ${DISCORD_CONTENT_LIMIT}`,
      false,
    )
  }

  return content
}

/**
 * Builds the webhook payload for one item.
 *
 * @throws DeliveryError when the content cannot fit
 */
export function formatNewsMessage(
  item: NewsItem,
  context: MessageContext,
): DiscordWebhookPayload {
  const payload: DiscordWebhookPayload = {
    content: formatNewsContent(item, context),
  }
  if (context.username?.trim()) {
    payload.username = context.username.trim()
  }
  if (context.avatarUrl?.trim()) {
    payload.avatar_url = context.avatarUrl.trim()
  }
  return payload
}

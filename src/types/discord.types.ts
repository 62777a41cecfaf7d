import type { DeliveryError } from './errors.js'

/**
 * Valid hostnames for Discord webhook URLs.
 * Discord uses both discord.com and the legacy discordapp.com domain.
 */
export const DISCORD_WEBHOOK_HOSTS = [
  'discord.com',
  'discordapp.com',
  'canary.discord.com',
  'ptb.discord.com',
] as const

/** Maximum length of a webhook message's content field */
export const DISCORD_CONTENT_LIMIT = 2000

export interface DiscordWebhookPayload {
  content: string
  username?: string
  avatar_url?: string
}

/**
 * Outcome of posting one item. A failed delivery carries the error but is
 * never thrown; the item simply stays unrecorded.
 */
export type DeliveryResult =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; error: DeliveryError }

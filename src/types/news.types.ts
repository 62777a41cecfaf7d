/**
 * A related article Google News bundles into an item's description.
 */
export interface RelatedArticle {
  title: string
  link: string
  press: string
}

export interface NewsItem {
  /** Feed guid, or the item link when the feed omits one */
  guid: string
  title: string
  link: string
  /** null when the feed date is missing or unparsable */
  pubDate: Date | null
  /** Publisher name from the <source> element */
  source?: string
  related: RelatedArticle[]
  /** "Full coverage" link from the description, when present */
  fullCoverageLink?: string
}

/**
 * Row shape of the news_items table.
 */
export interface NewsItemRow {
  guid: string
  pub_date: string | null
  title: string
  link: string | null
  topic: string | null
  related_news: string | null
  created_at?: string
}

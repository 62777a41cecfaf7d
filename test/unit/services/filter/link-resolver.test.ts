import { HttpResponse, http } from 'msw'
import {
  cleanUrl,
  decodeGoogleNewsUrl,
  resolveOriginalUrl,
  unescapeUnicode,
} from '../../../../src/services/filter/link-resolver.js'
import { describe, expect, it, vi } from 'vitest'
import {
  buildArticleLink,
  buildOpaqueArticleLink,
} from '../../../helpers/feed.js'
import { createMockLogger } from '../../../mocks/logger.js'
import { server } from '../../../setup/msw-setup.js'

const BATCH_EXECUTE_URL =
  'https://news.google.com/_/DotsSplashUi/data/batchexecute'

function batchExecuteBody(url: string): string {
  return `)]}'\n\n[["wrb.fr","Fbv4je","[\\"garturlres\\",\\"${url}\\",1]",null,null,null,"generic"]]`
}

describe('link-resolver', () => {
  describe('unescapeUnicode', () => {
    it('should replace \\u escapes with characters', () => {
      expect(unescapeUnicode('a\\u003db\\u0026c')).toBe('a=b&c')
    })
  })

  describe('cleanUrl', () => {
    it('should decode escapes and percent-encoding', () => {
      expect(
        cleanUrl('https://publisher.example.com/path\\u003fid\\u003d7'),
      ).toBe('https://publisher.example.com/path?id=7')
    })

    it('should drop stray backslashes', () => {
      expect(cleanUrl('https:\\/\\/publisher.example.com\\/a')).toBe(
        'https://publisher.example.com/a',
      )
    })

    it('should keep only id and article parameters for msn links', () => {
      expect(
        cleanUrl(
          'http://www.msn.com/en-us/news/story?ocid=feed&id=AA1&article=x9&cvid=abc',
        ),
      ).toBe('https://www.msn.com/en-us/news/story?id=AA1&article=x9')
    })

    it('should return text that is not a URL unchanged', () => {
      expect(cleanUrl('not a url')).toBe('not a url')
    })

    it('should keep malformed percent-encoding', () => {
      expect(cleanUrl('https://publisher.example.com/100%')).toBe(
        'https://publisher.example.com/100%',
      )
    })
  })

  describe('decodeGoogleNewsUrl', () => {
    it('should extract the embedded publisher URL', () => {
      const link = buildArticleLink('https://publisher.example.com/story/1')

      expect(decodeGoogleNewsUrl(link)).toEqual({
        kind: 'url',
        url: 'https://publisher.example.com/story/1',
      })
    })

    it('should report opaque ids for the batchexecute exchange', () => {
      const link = buildOpaqueArticleLink('QLRrmXabc')
      const id = new URL(link).pathname.split('/').pop()

      expect(decodeGoogleNewsUrl(link)).toEqual({ kind: 'batchexecute', id })
    })

    it('should return null for links that are not article links', () => {
      expect(decodeGoogleNewsUrl('https://news.google.com/topics/abc')).toBeNull()
      expect(
        decodeGoogleNewsUrl('https://publisher.example.com/articles/x'),
      ).toBeNull()
      expect(decodeGoogleNewsUrl('not a url')).toBeNull()
    })
  })

  describe('resolveOriginalUrl', () => {
    it('should leave non-aggregator links alone without any request', async () => {
      const log = createMockLogger()
      const fetchSpy = vi.spyOn(globalThis, 'fetch')

      const result = await resolveOriginalUrl(
        'https://publisher.example.com/a',
        { log, timeoutMs: 1000 },
      )

      expect(result).toBe('https://publisher.example.com/a')
      expect(fetchSpy).not.toHaveBeenCalled()
      fetchSpy.mockRestore()
    })

    it('should decode article links offline', async () => {
      const log = createMockLogger()
      const link = buildArticleLink('https://publisher.example.com/story/2')

      await expect(
        resolveOriginalUrl(link, { log, timeoutMs: 1000 }),
      ).resolves.toBe('https://publisher.example.com/story/2')
    })

    it('should exchange opaque ids through batchexecute', async () => {
      const log = createMockLogger()
      let form: string | null = null
      server.use(
        http.post(BATCH_EXECUTE_URL, async ({ request }) => {
          form = new URLSearchParams(await request.text()).get('f.req')
          return HttpResponse.text(
            batchExecuteBody('https://publisher.example.com/opaque'),
          )
        }),
      )
      const link = buildOpaqueArticleLink('QLRrmXabc')
      const id = new URL(link).pathname.split('/').pop() ?? ''

      const result = await resolveOriginalUrl(link, { log, timeoutMs: 1000 })

      expect(result).toBe('https://publisher.example.com/opaque')
      expect(form).toContain('Fbv4je')
      expect(form).toContain(id)
    })

    it('should fall back to the aggregator link when nothing resolves', async () => {
      const log = createMockLogger()
      server.use(
        http.get('https://news.google.com/rss/articles/:id', () =>
          HttpResponse.html('<html><body>Google News</body></html>'),
        ),
      )
      const link = 'https://news.google.com/rss/articles/bm90LWEtcGF5bG9hZA'

      const result = await resolveOriginalUrl(link, { log, timeoutMs: 1000 })

      expect(result).toBe(link)
      expect(log.warn).toHaveBeenCalledWith(
        { link },
        'Could not resolve publisher link, keeping aggregator link',
      )
    })

    it('should fall back when batchexecute and the redirect lookup fail', async () => {
      const log = createMockLogger()
      server.use(
        http.post(BATCH_EXECUTE_URL, () => new HttpResponse(null, { status: 500 })),
        http.get('https://news.google.com/rss/articles/:id', () =>
          HttpResponse.error(),
        ),
      )
      const link = buildOpaqueArticleLink('QLRrmXfail')

      const result = await resolveOriginalUrl(link, {
        log,
        timeoutMs: 1000,
        maxAttempts: 2,
      })

      expect(result).toBe(link)
      expect(log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ link }),
        'Decoding aggregator link failed',
      )
    })
  })
})

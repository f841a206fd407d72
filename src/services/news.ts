import NodeCache from 'node-cache';
import type { FastifyBaseLogger } from 'fastify';
import type { HttpClient } from './http-client.js';
import type {
  CryptoCompareResponse,
  CryptoPanicResponse,
  NewsItem,
} from './news.types.js';

export const MAX_NEWS_ITEMS = 5;
const FEED_TTL_SEC = 5 * 60;

export interface NewsClientConfig {
  cryptoCompareUrl: string;
  cryptoPanicUrl: string;
  cryptoPanicKey?: string;
}

interface Headline {
  title: string;
  text: string;
  url: string;
}

function matchesAny(text: string, terms: string[]): boolean {
  const haystack = text.toLowerCase();
  return terms.some((term) => haystack.includes(term));
}

export class NewsClient {
  constructor(
    private readonly http: HttpClient,
    private readonly config: NewsClientConfig,
    private readonly log: FastifyBaseLogger,
    private readonly cache: NodeCache = new NodeCache({
      stdTTL: FEED_TTL_SEC,
      checkperiod: FEED_TTL_SEC / 2,
      useClones: false,
    }),
  ) {}

  /** Up to five recent headlines mentioning the coin name or symbol. */
  async fetchCoinNews(coinName: string, symbol: string): Promise<NewsItem[]> {
    const terms = [coinName.toLowerCase(), symbol.toLowerCase()].filter(Boolean);
    const items: NewsItem[] = [];

    try {
      for (const headline of await this.loadCryptoCompare()) {
        if (items.length >= MAX_NEWS_ITEMS) break;
        if (!matchesAny(headline.text, terms)) continue;
        items.push({ source: 'CryptoCompare', title: headline.title, url: headline.url });
      }
    } catch (err) {
      this.log.error({ err }, 'failed to fetch CryptoCompare news');
    }

    if (this.config.cryptoPanicKey && items.length < MAX_NEWS_ITEMS) {
      try {
        for (const headline of await this.loadCryptoPanic(this.config.cryptoPanicKey)) {
          if (items.length >= MAX_NEWS_ITEMS) break;
          if (!matchesAny(headline.text, terms)) continue;
          items.push({ source: 'CryptoPanic', title: headline.title, url: headline.url });
        }
      } catch (err) {
        this.log.error({ err }, 'failed to fetch CryptoPanic news');
      }
    }

    this.log.info({ symbol, total: items.length }, 'news fetch summary');
    return items;
  }

  private async cached(
    key: string,
    load: () => Promise<Headline[]>,
  ): Promise<Headline[]> {
    const hit = this.cache.get<Headline[]>(key);
    if (hit) return hit;
    const headlines = await load();
    this.cache.set(key, headlines);
    return headlines;
  }

  private loadCryptoCompare(): Promise<Headline[]> {
    return this.cached('news:cryptocompare', async () => {
      const res = await this.http.getJson<CryptoCompareResponse>(
        `${this.config.cryptoCompareUrl}/data/v2/news/`,
        { lang: 'EN' },
      );
      const articles = Array.isArray(res?.Data) ? res.Data : [];
      return articles.flatMap((article) =>
        article.title && article.url
          ? [
              {
                title: article.title,
                text: `${article.title} ${article.body ?? ''}`,
                url: article.url,
              },
            ]
          : [],
      );
    });
  }

  private loadCryptoPanic(authToken: string): Promise<Headline[]> {
    return this.cached('news:cryptopanic', async () => {
      const res = await this.http.getJson<CryptoPanicResponse>(
        `${this.config.cryptoPanicUrl}/posts/`,
        { auth_token: authToken, public: true },
      );
      const posts = Array.isArray(res?.results) ? res.results : [];
      return posts.flatMap((post) =>
        post.title && post.url
          ? [{ title: post.title, text: post.title, url: post.url }]
          : [],
      );
    });
  }
}

import axios, { AxiosResponse } from 'axios';
import { Injectable } from '@nestjs/common';
import { LogService } from '../log/log.service';
import { FetchError, errorMessage } from '../../libs/errors/report.error';
import { Article, NewsApiArticle, NewsApiResponse, NewsSection } from '../../models/article';
import { NewsConfig } from '../../models/report-config';

const REMOVED_TITLE = '[Removed]';

@Injectable()
export class NewsService {
  constructor(
    private readonly logService: LogService
  ) { }

  getCryptoNews(config: NewsConfig) {
    return this.fetchArticles(config, NewsSection.Crypto, config.cryptoQuery, config.cryptoLimit);
  }

  getPoliticalNews(config: NewsConfig) {
    return this.fetchArticles(config, NewsSection.Political, config.politicalQuery, config.politicalLimit);
  }

  async fetchArticles(config: NewsConfig, section: NewsSection, query: string, limit: number): Promise<Article[]> {
    const { baseUrl, apiKey, language, timeoutMs } = config;

    let response: AxiosResponse<NewsApiResponse>;
    try {
      response = await axios.get<NewsApiResponse>(`${baseUrl}/everything`, {
        params: {
          q: query,
          language,
          sortBy: 'publishedAt',
          pageSize: limit,
        },
        headers: { 'X-Api-Key': apiKey },
        timeout: timeoutMs,
        validateStatus: () => true,
      });
    } catch (e) {
      throw new FetchError(section, errorMessage(e), { cause: e });
    }

    const { status, data } = response;
    if (status < 200 || status >= 300) {
      const detail = this.isResponseBody(data) && data.message ? `: ${data.message}` : '';
      throw new FetchError(section, `HTTP ${status}${detail}`, { status });
    }
    if (!this.isResponseBody(data)) {
      throw new FetchError(section, 'malformed response body', { status });
    }
    if (data.status !== 'ok') {
      throw new FetchError(section, `${data.code || 'error'}: ${data.message || 'unknown error'}`, { status });
    }
    if (!Array.isArray(data.articles)) {
      throw new FetchError(section, 'response has no articles', { status });
    }

    const articles = this.selectArticles(data.articles, limit);
    this.logService.log(`Fetched ${articles.length} ${section} article(s)`);
    return articles;
  }

  isResponseBody(data: unknown): data is NewsApiResponse {
    return typeof data === 'object' && data !== null && 'status' in data;
  }

  /**
   * Most-recent-first, at most limit, dropping entries without a title or link.
   */
  selectArticles(items: NewsApiArticle[], limit: number): Article[] {
    return items
      .map(item => this.toArticle(item))
      .filter((article): article is Article => article !== null)
      .map((article, index) => ({ article, index, time: Date.parse(article.publishedAt) }))
      .sort((a, b) => {
        const timeA = Number.isNaN(a.time) ? -Infinity : a.time;
        const timeB = Number.isNaN(b.time) ? -Infinity : b.time;
        if (timeA === timeB) return a.index - b.index;
        return timeB - timeA;
      })
      .slice(0, limit)
      .map(({ article }) => article);
  }

  toArticle(item: NewsApiArticle): Article | null {
    const title = item.title?.trim();
    const url = item.url?.trim();
    if (!title || !url || title === REMOVED_TITLE) return null;

    const article: Article = {
      title,
      source: item.source?.name?.trim() || 'Unknown source',
      url,
      publishedAt: item.publishedAt || '',
    };
    const description = item.description?.trim();
    if (description) article.description = description;
    return article;
  }
}

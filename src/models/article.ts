export enum NewsSection {
  Crypto = 'crypto news',
  Political = 'political news',
}

export interface Article {
  title: string;

  source: string;

  url: string;

  /**
   * ISO-8601, ex: 2026-10-19T08:30:00Z
   */
  publishedAt: string;

  description?: string;
}

export interface NewsApiArticle {
  source?: { id?: string | null; name?: string | null };
  author?: string | null;
  title?: string | null;
  description?: string | null;
  url?: string | null;
  urlToImage?: string | null;
  publishedAt?: string | null;
  content?: string | null;
}

export interface NewsApiResponse {
  status: 'ok' | 'error';
  totalResults?: number;
  articles?: NewsApiArticle[];
  code?: string;
  message?: string;
}

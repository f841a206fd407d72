export type NewsSource = 'CryptoCompare' | 'CryptoPanic';

export interface NewsItem {
  source: NewsSource;
  title: string;
  url: string;
}

export interface CryptoCompareArticle {
  title?: string;
  body?: string;
  url?: string;
}

export interface CryptoCompareResponse {
  Data?: CryptoCompareArticle[];
}

export interface CryptoPanicPost {
  title?: string;
  url?: string;
}

export interface CryptoPanicResponse {
  results?: CryptoPanicPost[];
}

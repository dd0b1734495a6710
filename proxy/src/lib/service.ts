import {
  ArticleDataSchema,
  ArticleDetail,
  FaqDataSchema,
  FaqResponse,
  ProductDataSchema,
  ProductDetail,
  SearchDataSchema,
  SearchResponse
} from "../types";
import { NotFoundError } from "./errors";
import {
  ARTICLE_BY_HANDLE_QUERY,
  FAQ_PAGES_QUERY,
  FAQ_PAGE_LIMIT,
  PRODUCT_BY_HANDLE_QUERY,
  SEARCH_QUERY,
  articleHandleFilter
} from "./queries";
import { toArticleDetail, toFaqEntry, toProductDetail, toSearchResults } from "./shape";
import { StorefrontClient } from "./storefront";

export const DEFAULT_SEARCH_LIMIT = 5;

export class StorefrontService {
  constructor(private readonly client: StorefrontClient) {}

  get configured(): boolean {
    return this.client.configured;
  }

  async search(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<SearchResponse> {
    const data = await this.client.query(SearchDataSchema, SEARCH_QUERY, { query, first: limit });
    return {
      query,
      results: toSearchResults(data, limit, this.client.domain)
    };
  }

  async product(handle: string): Promise<ProductDetail> {
    const data = await this.client.query(ProductDataSchema, PRODUCT_BY_HANDLE_QUERY, { handle });
    if (!data.product) {
      throw new NotFoundError("Product not found by handle");
    }
    return toProductDetail(data.product, this.client.domain);
  }

  async article(handle: string): Promise<ArticleDetail> {
    const data = await this.client.query(ArticleDataSchema, ARTICLE_BY_HANDLE_QUERY, {
      query: articleHandleFilter(handle)
    });
    const article = data.articles.edges[0]?.node;
    if (!article) {
      throw new NotFoundError("Article not found by handle");
    }
    return toArticleDetail(article, this.client.domain);
  }

  async faq(): Promise<FaqResponse> {
    const data = await this.client.query(FaqDataSchema, FAQ_PAGES_QUERY, { first: FAQ_PAGE_LIMIT });
    return {
      faqs: data.pages.edges.slice(0, FAQ_PAGE_LIMIT).map((edge) => toFaqEntry(edge.node))
    };
  }
}

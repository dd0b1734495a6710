import {
  ArticleDetail,
  FaqEntry,
  ProductDetail,
  SearchData,
  SearchResult,
  StorefrontArticle,
  StorefrontPage,
  StorefrontProduct
} from "../types";

export const SNIPPET_MAX_CHARS = 300;
export const PRODUCT_SCORE = 1.0;
export const ARTICLE_SCORE = 0.8;
const DEFAULT_BLOG_HANDLE = "news";

export function truncateSnippet(text: string | null | undefined, maxChars = SNIPPET_MAX_CHARS): string {
  if (!text) {
    return "";
  }
  // Slice by code point so a surrogate pair is never split.
  return Array.from(text).slice(0, maxChars).join("");
}

export function productUrl(product: Pick<StorefrontProduct, "handle" | "onlineStoreUrl">, domain: string): string {
  return product.onlineStoreUrl || `https://${domain}/products/${product.handle}`;
}

export function articleUrl(article: Pick<StorefrontArticle, "handle" | "onlineStoreUrl" | "blog">, domain: string): string {
  if (article.onlineStoreUrl) {
    return article.onlineStoreUrl;
  }
  const blogHandle = article.blog?.handle || DEFAULT_BLOG_HANDLE;
  return `https://${domain}/blogs/${blogHandle}/${article.handle}`;
}

function imageUrls(product: StorefrontProduct): string[] {
  return (product.images?.edges ?? []).map((edge) => edge.node.url);
}

function minPrice(product: StorefrontProduct): string | undefined {
  return product.priceRange?.minVariantPrice.amount;
}

export function productToSearchResult(product: StorefrontProduct, domain: string): SearchResult {
  const [image] = imageUrls(product);
  const price = minPrice(product);
  return {
    id: product.id,
    title: product.title,
    url: productUrl(product, domain),
    snippet: truncateSnippet(product.description),
    score: PRODUCT_SCORE,
    ...(image ? { image } : {}),
    ...(price !== undefined ? { price } : {})
  };
}

export function articleToSearchResult(article: StorefrontArticle, domain: string): SearchResult {
  return {
    id: article.id ?? article.handle,
    title: article.title,
    url: articleUrl(article, domain),
    snippet: truncateSnippet(article.excerpt || article.content),
    score: ARTICLE_SCORE
  };
}

/**
 * Products first, then articles, cut to `limit`. Each collection was already
 * fetched with `first: limit`, so articles are dropped whenever products fill
 * the limit.
 */
export function toSearchResults(data: SearchData, limit: number, domain: string): SearchResult[] {
  const products = data.products.edges.map((edge) => productToSearchResult(edge.node, domain));
  const articles = data.articles.edges.map((edge) => articleToSearchResult(edge.node, domain));
  return [...products, ...articles].slice(0, limit);
}

export function toProductDetail(product: StorefrontProduct, domain: string): ProductDetail {
  return {
    id: product.id,
    title: product.title,
    description: product.description ?? "",
    url: productUrl(product, domain),
    price: minPrice(product) ?? null,
    images: imageUrls(product)
  };
}

export function toArticleDetail(article: StorefrontArticle, domain: string): ArticleDetail {
  return {
    title: article.title,
    url: articleUrl(article, domain),
    excerpt: article.excerpt ?? "",
    content: article.content ?? ""
  };
}

export function toFaqEntry(page: StorefrontPage): FaqEntry {
  return {
    question: page.title,
    answer: page.body ?? ""
  };
}

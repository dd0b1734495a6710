import { z } from "zod";

const ImageEdgesSchema = z.object({
  edges: z.array(z.object({ node: z.object({ url: z.string() }) }))
});

const MoneySchema = z.object({
  amount: z.string(),
  currencyCode: z.string().optional()
});

const PriceRangeSchema = z.object({
  minVariantPrice: MoneySchema
});

export const StorefrontProductSchema = z.object({
  id: z.string(),
  title: z.string(),
  handle: z.string(),
  description: z.string().nullable().optional(),
  onlineStoreUrl: z.string().nullable().optional(),
  images: ImageEdgesSchema.optional(),
  priceRange: PriceRangeSchema.nullable().optional()
});

export const StorefrontArticleSchema = z.object({
  id: z.string().optional(),
  title: z.string(),
  handle: z.string(),
  excerpt: z.string().nullable().optional(),
  content: z.string().nullable().optional(),
  onlineStoreUrl: z.string().nullable().optional(),
  blog: z.object({ handle: z.string() }).nullable().optional()
});

export const StorefrontPageSchema = z.object({
  title: z.string(),
  body: z.string().nullable().optional()
});

const edgesOf = <T extends z.ZodTypeAny>(node: T) => z.object({ edges: z.array(z.object({ node })) });

export const SearchDataSchema = z.object({
  products: edgesOf(StorefrontProductSchema),
  articles: edgesOf(StorefrontArticleSchema)
});

export const ProductDataSchema = z.object({
  product: StorefrontProductSchema.nullable()
});

export const ArticleDataSchema = z.object({
  articles: edgesOf(StorefrontArticleSchema)
});

export const FaqDataSchema = z.object({
  pages: edgesOf(StorefrontPageSchema)
});

export type StorefrontProduct = z.infer<typeof StorefrontProductSchema>;
export type StorefrontArticle = z.infer<typeof StorefrontArticleSchema>;
export type StorefrontPage = z.infer<typeof StorefrontPageSchema>;
export type SearchData = z.infer<typeof SearchDataSchema>;

export interface SearchResult {
  id: string;
  title: string;
  url: string;
  snippet: string;
  score: number;
  image?: string;
  price?: string;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
}

export interface ProductDetail {
  id: string;
  title: string;
  description: string;
  url: string;
  price: string | null;
  images: string[];
}

export interface ArticleDetail {
  title: string;
  url: string;
  excerpt: string;
  content: string;
}

export interface FaqEntry {
  question: string;
  answer: string;
}

export interface FaqResponse {
  faqs: FaqEntry[];
}

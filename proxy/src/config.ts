import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().min(1).optional()
);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  SHOPIFY_STORE_DOMAIN: optionalNonEmptyString,
  SHOPIFY_STOREFRONT_ACCESS_TOKEN: optionalNonEmptyString,
  SHOPIFY_API_VERSION: z.string().regex(/^\d{4}-\d{2}$/).default("2024-01"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  ALLOWED_ORIGIN: z.string().min(1).default("https://chat.openai.com"),
  LOG_LEVEL: z.string().min(1).default("info")
});

export type AppConfig = z.infer<typeof EnvSchema>;

export interface StorefrontConfig {
  domain?: string;
  accessToken?: string;
  apiVersion: string;
  timeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  return EnvSchema.parse(env);
}

// Shop domains are often pasted as full URLs; keep only the host.
export function normalizeShopDomain(input: string): string {
  return input
    .trim()
    .replace(/^https?:\/\//i, "")
    .replace(/\/.*$/, "")
    .toLowerCase();
}

export function toStorefrontConfig(config: AppConfig): StorefrontConfig {
  return {
    domain: config.SHOPIFY_STORE_DOMAIN ? normalizeShopDomain(config.SHOPIFY_STORE_DOMAIN) : undefined,
    accessToken: config.SHOPIFY_STOREFRONT_ACCESS_TOKEN,
    apiVersion: config.SHOPIFY_API_VERSION,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS
  };
}

export const config: AppConfig = loadConfig(process.env);

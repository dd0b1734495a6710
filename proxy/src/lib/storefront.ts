import { z } from "zod";
import { StorefrontConfig } from "../config";
import { ConfigurationError, UpstreamError, toErrorMessage } from "./errors";
import { Logger } from "./logger";

export type GraphQLVariables = Record<string, unknown>;

const GraphQLEnvelopeSchema = z.object({
  data: z.record(z.unknown()).nullable().optional(),
  errors: z.array(z.unknown()).optional()
});

interface Credentials {
  domain: string;
  accessToken: string;
}

export interface StorefrontClientOptions {
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export function buildStorefrontEndpoint(domain: string, apiVersion: string): string {
  return `https://${domain}/api/${apiVersion}/graphql.json`;
}

/**
 * Single-attempt GraphQL client for the Shopify Storefront API. Every call is
 * one POST bounded by `timeoutMs`; failures surface as {@link UpstreamError}.
 */
export class StorefrontClient {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly config: StorefrontConfig, options: StorefrontClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? new Logger("proxy.storefront", process.env.LOG_LEVEL);
  }

  get configured(): boolean {
    return Boolean(this.config.domain && this.config.accessToken);
  }

  /** Shop domain used for canonical URL fallbacks. */
  get domain(): string {
    return this.requireCredentials().domain;
  }

  private requireCredentials(): Credentials {
    const { domain, accessToken } = this.config;
    if (!domain || !accessToken) {
      const missing = [!domain ? "SHOPIFY_STORE_DOMAIN" : null, !accessToken ? "SHOPIFY_STOREFRONT_ACCESS_TOKEN" : null]
        .filter((name): name is string => name !== null)
        .join(", ");
      throw new ConfigurationError(`Storefront API is not configured: missing ${missing}`);
    }
    return { domain, accessToken };
  }

  async execute(query: string, variables: GraphQLVariables = {}): Promise<Record<string, unknown>> {
    const { domain, accessToken } = this.requireCredentials();
    const endpoint = buildStorefrontEndpoint(domain, this.config.apiVersion);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const started = Date.now();

    try {
      let status: number;
      let ok: boolean;
      let body: string;
      try {
        const response = await this.fetchImpl(endpoint, {
          method: "POST",
          signal: controller.signal,
          headers: {
            "content-type": "application/json",
            accept: "application/json",
            "x-shopify-storefront-access-token": accessToken
          },
          body: JSON.stringify({ query, variables })
        });
        status = response.status;
        ok = response.ok;
        body = await response.text();
      } catch (error) {
        if (controller.signal.aborted) {
          this.logger.warn("storefront_timeout", { endpoint, timeout_ms: this.config.timeoutMs });
          throw new UpstreamError(`Storefront request timed out after ${this.config.timeoutMs}ms`, { cause: error });
        }
        this.logger.warn("storefront_unreachable", { endpoint, error: toErrorMessage(error) });
        throw new UpstreamError(`Storefront request failed: ${toErrorMessage(error)}`, { cause: error });
      }

      this.logger.debug("storefront_responded", { endpoint, status, duration_ms: Date.now() - started });

      if (!ok) {
        this.logger.warn("storefront_http_error", { endpoint, status });
        throw new UpstreamError(`Storefront API returned HTTP ${status}`, {
          detail: body || `Storefront API returned HTTP ${status}`,
          upstreamStatus: status
        });
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch (error) {
        throw new UpstreamError("Storefront API returned invalid JSON", { upstreamStatus: status, cause: error });
      }

      const envelope = GraphQLEnvelopeSchema.safeParse(payload);
      if (!envelope.success) {
        throw new UpstreamError("Storefront API returned an unexpected payload", { upstreamStatus: status });
      }

      if (envelope.data.errors && envelope.data.errors.length > 0) {
        this.logger.warn("storefront_graphql_errors", { endpoint, error_count: envelope.data.errors.length });
        throw new UpstreamError("Storefront API returned GraphQL errors", {
          detail: envelope.data.errors,
          upstreamStatus: status
        });
      }

      if (!envelope.data.data) {
        throw new UpstreamError("Storefront API response carried no data", { upstreamStatus: status });
      }

      return envelope.data.data;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Runs `query` and validates the `data` payload against `schema`. */
  async query<S extends z.ZodTypeAny>(schema: S, query: string, variables: GraphQLVariables = {}): Promise<z.infer<S>> {
    const data = await this.execute(query, variables);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn("storefront_shape_mismatch", { issues: parsed.error.flatten() });
      throw new UpstreamError("Storefront API response did not match the expected shape");
    }
    return parsed.data;
  }
}

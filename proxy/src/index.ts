import { createApp } from "./app";
import { config, toStorefrontConfig } from "./config";
import { Logger } from "./lib/logger";
import { StorefrontService } from "./lib/service";
import { StorefrontClient } from "./lib/storefront";

const logger = new Logger("proxy", config.LOG_LEVEL);
const storefrontConfig = toStorefrontConfig(config);
const client = new StorefrontClient(storefrontConfig, { logger: logger.child("storefront") });
const service = new StorefrontService(client);

const app = createApp({
  service,
  logger,
  allowedOrigin: config.ALLOWED_ORIGIN
});

const server = app.listen(config.PORT, () => {
  logger.info("server_started", {
    port: config.PORT,
    log_level: config.LOG_LEVEL,
    shop_domain: storefrontConfig.domain ?? null,
    api_version: storefrontConfig.apiVersion,
    upstream_timeout_ms: storefrontConfig.timeoutMs,
    allowed_origin: config.ALLOWED_ORIGIN,
    storefront: client.configured ? "configured" : "unconfigured"
  });
  if (!client.configured) {
    logger.warn("storefront_unconfigured", {
      hint: "set SHOPIFY_STORE_DOMAIN and SHOPIFY_STOREFRONT_ACCESS_TOKEN; data endpoints answer 500 until then"
    });
  }
});

const shutdown = (): void => {
  logger.info("shutdown_started");
  server.close((error) => {
    if (error) {
      logger.error("shutdown_failed", { error });
      process.exitCode = 1;
      return;
    }
    logger.info("shutdown_completed");
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

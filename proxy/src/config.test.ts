import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig, normalizeShopDomain, toStorefrontConfig } from "./config";

test("loadConfig applies defaults when only credentials are set", () => {
  const parsed = loadConfig({
    SHOPIFY_STORE_DOMAIN: "example.myshopify.com",
    SHOPIFY_STOREFRONT_ACCESS_TOKEN: "test-token"
  });

  assert.equal(parsed.PORT, 8000);
  assert.equal(parsed.SHOPIFY_API_VERSION, "2024-01");
  assert.equal(parsed.UPSTREAM_TIMEOUT_MS, 10000);
  assert.equal(parsed.ALLOWED_ORIGIN, "https://chat.openai.com");
  assert.equal(parsed.LOG_LEVEL, "info");
});

test("loadConfig treats blank credentials as unset", () => {
  const parsed = loadConfig({ SHOPIFY_STORE_DOMAIN: "   ", SHOPIFY_STOREFRONT_ACCESS_TOKEN: "" });
  assert.equal(parsed.SHOPIFY_STORE_DOMAIN, undefined);
  assert.equal(parsed.SHOPIFY_STOREFRONT_ACCESS_TOKEN, undefined);
});

test("loadConfig coerces the port override", () => {
  assert.equal(loadConfig({ PORT: "3005" }).PORT, 3005);
  assert.throws(() => loadConfig({ PORT: "-1" }));
});

test("normalizeShopDomain strips scheme and path", () => {
  assert.equal(normalizeShopDomain("https://Example.myshopify.com/admin"), "example.myshopify.com");
});

test("toStorefrontConfig maps environment keys onto the client settings", () => {
  const settings = toStorefrontConfig(
    loadConfig({
      SHOPIFY_STORE_DOMAIN: "https://example.myshopify.com/",
      SHOPIFY_STOREFRONT_ACCESS_TOKEN: "test-token",
      SHOPIFY_API_VERSION: "2023-10",
      UPSTREAM_TIMEOUT_MS: "2500"
    })
  );

  assert.deepEqual(settings, {
    domain: "example.myshopify.com",
    accessToken: "test-token",
    apiVersion: "2023-10",
    timeoutMs: 2500
  });
});

import path from "node:path";
import { Router } from "express";
import { Logger } from "../lib/logger";

export const PLUGIN_MANIFEST_PATH = path.join(".well-known", "ai-plugin.json");
export const OPENAPI_SPEC_PATH = "openapi.yaml";

/** Serves the plugin manifest and the OpenAPI document from `publicDir`. */
export function createDiscoveryRouter(publicDir: string, logger: Logger): Router {
  const router = Router();

  router.get("/.well-known/ai-plugin.json", (_request, response, next) => {
    const filePath = path.resolve(publicDir, PLUGIN_MANIFEST_PATH);
    response.sendFile(filePath, { dotfiles: "allow" }, (error) => {
      if (error) {
        logger.error("manifest_unavailable", { file: filePath, error });
        next(new Error("Plugin manifest is unavailable", { cause: error }));
      }
    });
  });

  router.get("/openapi.yaml", (_request, response, next) => {
    const filePath = path.resolve(publicDir, OPENAPI_SPEC_PATH);
    response.sendFile(filePath, { headers: { "Content-Type": "text/yaml; charset=utf-8" } }, (error) => {
      if (error) {
        logger.error("openapi_unavailable", { file: filePath, error });
        next(new Error("OpenAPI document is unavailable", { cause: error }));
      }
    });
  });

  return router;
}

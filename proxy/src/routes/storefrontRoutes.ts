import { Router } from "express";
import { z } from "zod";
import { HttpError } from "../lib/errors";
import { Logger } from "../lib/logger";
import { DEFAULT_SEARCH_LIMIT, StorefrontService } from "../lib/service";

// Storefront connections cap `first` at 250.
const MAX_SEARCH_LIMIT = 250;

const searchQuerySchema = z.object({
  q: z.string().refine((value) => value.trim().length > 0, { message: "q must not be blank" }),
  limit: z.coerce.number().int().positive().max(MAX_SEARCH_LIMIT).default(DEFAULT_SEARCH_LIMIT)
});

export function createStorefrontRouter(service: StorefrontService, logger: Logger): Router {
  const router = Router();

  router.get("/health", (_request, response) => {
    const configured = service.configured;
    logger.debug("health_requested", { configured });
    response.json({ ok: true, configured, timestamp: new Date().toISOString() });
  });

  router.get("/search", async (request, response, next) => {
    const parsed = searchQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("search_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ detail: parsed.error.flatten() });
      return;
    }

    try {
      const result = await service.search(parsed.data.q, parsed.data.limit);
      logger.info("search_completed", {
        query: parsed.data.q,
        limit: parsed.data.limit,
        returned_results: result.results.length
      });
      response.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get("/product/:handle", async (request, response, next) => {
    try {
      const product = await service.product(request.params.handle);
      logger.debug("product_resolved", { handle: request.params.handle, image_count: product.images.length });
      response.json(product);
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) {
        logger.info("product_not_found", { handle: request.params.handle });
      }
      next(error);
    }
  });

  router.get("/blog/:slug", async (request, response, next) => {
    try {
      const article = await service.article(request.params.slug);
      logger.debug("article_resolved", { slug: request.params.slug });
      response.json(article);
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) {
        logger.info("article_not_found", { slug: request.params.slug });
      }
      next(error);
    }
  });

  router.get("/faq", async (_request, response, next) => {
    try {
      const result = await service.faq();
      logger.debug("faq_listed", { faq_count: result.faqs.length });
      response.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

import { Router } from 'express';

import type { JwksService } from '../../core/jwks-service.js';
import { createConsoleLogger, type Logger } from '../../utils/logger.js';

/**
 * Default JWKS route
 */
export const DEFAULT_JWKS_PATH = '/.well-known/jwks.json';

/**
 * Default Cache-Control for the JWKS document: 5 minutes
 */
export const DEFAULT_JWKS_CACHE_CONTROL = 'public, max-age=300';

/**
 * Anything that can produce a public JWKS.
 */
export type JwksSource = Pick<JwksService, 'getPublicJwks'>;

/**
 * Options for {@link createJwksRouter}.
 */
export interface JwksRouterOptions {
  /** Route the document is served on. Default: '/.well-known/jwks.json' */
  path?: string;
  /** Cache-Control header value. Default: 'public, max-age=300' */
  cacheControl?: string;
  logger?: Logger;
}

/**
 * Create an Express router that publishes the public JWKS.
 *
 * @param service - Usually a {@link JwksService}
 * @param options - Router options
 * @returns Express router to mount on your app
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createJwksRouter } from 'jwks-keyring/express';
 *
 * const app = express();
 * app.use(createJwksRouter(jwksService));
 * app.listen(3000);
 * // GET http://localhost:3000/.well-known/jwks.json
 * ```
 */
export function createJwksRouter(service: JwksSource, options: JwksRouterOptions = {}): Router {
  const path = options.path ?? DEFAULT_JWKS_PATH;
  const cacheControl = options.cacheControl ?? DEFAULT_JWKS_CACHE_CONTROL;
  const logger = options.logger ?? createConsoleLogger();

  const router = Router();

  router.get(path, async (_req, res) => {
    try {
      const jwks = await service.getPublicJwks();
      res.setHeader('Cache-Control', cacheControl);
      res.json(jwks);
    } catch (error) {
      logger.error('Failed to load JWKS', error);
      res.status(500).json({ error: 'server_error' });
    }
  });

  return router;
}

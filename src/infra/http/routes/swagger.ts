import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from '../swagger.js';

/**
 * Swagger UI at /docs and the raw OpenAPI document at /docs/openapi.json.
 */
export function createSwaggerRoutes() {
  const router = Router();

  router.get('/docs/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get(
    '/docs',
    swaggerUi.setup(swaggerSpec, {
      customSiteTitle: 'Account API',
      customCss: '.swagger-ui .topbar { display: none }',
    })
  );

  return router;
}

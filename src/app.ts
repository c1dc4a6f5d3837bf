import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { createHealthRouter } from './routes/health.js';
import { createUploadsRouter } from './routes/uploads.js';
import { createCustomersRouter } from './routes/customers.js';
import { createReportsRouter } from './routes/reports.js';
import type { SalesQueries } from './services/sales-queries.js';
import type { SalesStore } from './services/sales-store.js';
import { errorHandler } from './middleware/error-handler.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export type AppDependencies = {
  store: SalesStore;
  queries: SalesQueries;
  upload: AppConfig['upload'];
  /** Disable access logs, e.g. under test. */
  accessLog?: boolean;
};

function loadOpenApiDocument(): Record<string, unknown> {
  return z.record(z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));
}

export function createApp({ store, queries, upload, accessLog = true }: AppDependencies): Express {
  const openApiDocument = loadOpenApiDocument();

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (accessLog) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', createHealthRouter(queries));

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/uploads', createUploadsRouter({ store, queries, upload }));
  app.use('/api/v1/customers', createCustomersRouter(queries));
  app.use('/api/v1', createReportsRouter(queries));

  app.use(errorHandler);

  return app;
}

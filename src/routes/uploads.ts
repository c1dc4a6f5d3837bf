import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { rowErrorPolicySchema, type AppConfig } from '../config.js';
import { badRequest } from '../errors.js';
import { ingestSalesWorkbook } from '../services/sales-ingestion.js';
import type { SalesQueries } from '../services/sales-queries.js';
import type { SalesStore } from '../services/sales-store.js';
import { asyncHandler } from '../utils/async-handler.js';

const uploadSchema = z.object({
  period: z.string({ required_error: 'period is required' }),
  policy: rowErrorPolicySchema.optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

type UploadRouterDeps = {
  store: SalesStore;
  queries: SalesQueries;
  upload: AppConfig['upload'];
};

export function createUploadsRouter({ store, queries, upload: settings }: UploadRouterDeps): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      files: 1,
      fileSize: settings.maxFileSize,
    },
  });

  router.post(
    '/',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const body = uploadSchema.parse(req.body);
      const file = req.file;
      if (!file) {
        throw badRequest('file is required');
      }

      const policy = body.policy ?? settings.policy;
      const summary = await ingestSalesWorkbook(
        store,
        { period: body.period, file: file.buffer, filename: file.originalname },
        {
          layout: { headerRow: settings.headerRow, sheetName: settings.sheetName },
          policy,
        }
      );

      console.info(
        `[ingest] ${summary.period} ${file.originalname}: rows=${summary.rowsProcessed} skipped=${summary.rowsSkipped} ` +
          `customers+${summary.customersCreated} brands+${summary.brandsCreated} ` +
          `facts+${summary.factsCreated} ~${summary.factsUpdated} -${summary.factsRemoved}`
      );
      res.status(201).json(summary);
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { limit } = listQuerySchema.parse(req.query);
      res.json(await queries.listUploads(limit));
    })
  );

  return router;
}

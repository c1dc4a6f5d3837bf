import type { RowErrorPolicy } from '../config.js';
import { query, type Queryable } from '../db.js';

type UploadLogInput = {
  period: string;
  filename: string | null;
  policy: RowErrorPolicy;
  summary: unknown;
  client: Queryable;
};

export async function logUpload({ period, filename, policy, summary, client }: UploadLogInput): Promise<string> {
  const { rows } = await query<{ id: string }>(
    client,
    `insert into upload_batch (period, filename, policy, summary)
     values ($1, $2, $3, $4::jsonb)
     returning id`,
    [period, filename, policy, JSON.stringify(summary)]
  );
  return rows[0].id;
}

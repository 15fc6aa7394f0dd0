import fs from 'fs';
import path from 'path';
import { pool } from './database';
import { logger } from '../utils/logger';

async function migrate() {
  const migrationsDir = path.resolve(process.cwd(), 'migrations');
  const files = fs.readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();

  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  let applied = 0;
  for (const file of files) {
    const existing = await pool.query('SELECT 1 FROM _migrations WHERE name = $1', [file]);
    if (existing.rows.length > 0) {
      logger.debug('Migration already applied', { file });
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
    await pool.query(sql);
    await pool.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    logger.info('Migration applied', { file });
    applied++;
  }

  logger.info('Migrations complete', { applied, total: files.length });
  await pool.end();
}

migrate().catch((err: unknown) => {
  logger.error('Migration failed', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});

/**
 * Programmatic migration runner for use during server startup
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ module: 'migrations' });

// Get the directory name for ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * SQL files are not emitted by tsc, so a compiled build falls back to the
 * source tree.
 */
function resolveMigrationsDir(): string | null {
  const candidates = [
    join(__dirname, 'migrations'),
    join(process.cwd(), 'src', 'db', 'migrations'),
  ];
  return candidates.find((dir) => existsSync(dir)) ?? null;
}

/**
 * Check if a migration has already been applied
 */
async function isMigrationApplied(pool: Pool, version: string): Promise<boolean> {
  try {
    const result = await pool.query(
      'SELECT version FROM schema_migrations WHERE version = $1',
      [version]
    );
    return result.rowCount !== null && result.rowCount > 0;
  } catch (error) {
    // If schema_migrations table doesn't exist yet, no migrations have been applied
    if (error instanceof Error && error.message.includes('does not exist')) {
      return false;
    }
    throw error;
  }
}

export interface MigrationResult {
  success: boolean;
  applied: string[];
  skipped: string[];
  error?: string;
}

/**
 * Run all pending migrations
 * Safe to call multiple times - only runs pending migrations
 */
export async function runMigrationsOnStartup(pool: Pool): Promise<MigrationResult> {
  const applied: string[] = [];
  const skipped: string[] = [];

  const dir = resolveMigrationsDir();
  if (!dir) {
    logger.warn('No migrations directory found');
    return { success: true, applied, skipped };
  }

  try {
    const files = readdirSync(dir).filter((f) => f.endsWith('.sql')).sort();

    for (const file of files) {
      const version = file.replace('.sql', '');

      if (await isMigrationApplied(pool, version)) {
        skipped.push(version);
        continue;
      }

      logger.info({ version }, 'Running migration');
      await pool.query(readFileSync(join(dir, file), 'utf-8'));
      applied.push(version);
    }

    return { success: true, applied, skipped };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message, applied }, 'Migration failed');
    return { success: false, applied, skipped, error: message };
  }
}

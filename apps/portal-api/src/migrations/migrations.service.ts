/**
 * Migrations Service
 * Applies pending schema migrations at startup when RUN_MIGRATIONS is set
 */

import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '@portal/common/database';
import { Migration, MigrationLoaderService } from './migration-loader.service';

export interface MigrationRunSummary {
  applied: string[];
  skipped: string[];
}

const MIGRATION_TIMEOUT_MS = 300000; // 5 minutes

@Injectable()
export class MigrationsService implements OnApplicationBootstrap {
  private readonly logger = new Logger(MigrationsService.name);

  constructor(
    private configService: ConfigService,
    private databaseService: DatabaseService,
    private migrationLoader: MigrationLoaderService,
  ) {}

  async onApplicationBootstrap() {
    if (!this.configService.get<boolean>('runMigrations', false)) {
      return;
    }
    await this.runPending();
  }

  /**
   * Apply every migration not yet recorded. A recorded migration whose file
   * changed aborts the run.
   */
  async runPending(): Promise<MigrationRunSummary> {
    const startTime = Date.now();
    const migrations = await this.migrationLoader.loadMigrations();

    await this.databaseService.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        checksum TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);

    const appliedRows = await this.databaseService.queryMany<{
      name: string;
      checksum: string;
    }>(`SELECT name, checksum FROM schema_migrations ORDER BY name`);
    const appliedMap = new Map(appliedRows.map((row) => [row.name, row.checksum]));

    const summary: MigrationRunSummary = { applied: [], skipped: [] };

    for (const migration of migrations) {
      const existingChecksum = appliedMap.get(migration.name);

      if (existingChecksum !== undefined) {
        if (existingChecksum !== migration.checksum) {
          throw new Error(
            `Checksum mismatch for ${migration.name}: expected ${existingChecksum}, got ${migration.checksum}`,
          );
        }
        summary.skipped.push(migration.name);
        continue;
      }

      await this.apply(migration);
      summary.applied.push(migration.name);
    }

    this.logger.log(
      `Migrations complete: ${summary.applied.length} applied, ${summary.skipped.length} skipped, ${Date.now() - startTime}ms`,
    );
    return summary;
  }

  private async apply(migration: Migration): Promise<void> {
    const startTime = Date.now();

    await this.databaseService.transaction(
      async (client) => {
        await client.query(migration.sql);
        await client.query(
          `INSERT INTO schema_migrations (name, checksum, applied_at) VALUES ($1, $2, now())`,
          [migration.name, migration.checksum],
        );
      },
      { statementTimeoutMs: MIGRATION_TIMEOUT_MS },
    );

    this.logger.log(`Migration ${migration.name} applied (${Date.now() - startTime}ms)`);
  }
}

/**
 * Migration Loader Service
 * Loads ordered SQL migration files from libs/sql/migrations/
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as crypto from 'crypto';

export interface Migration {
  name: string;
  filename: string;
  sql: string;
  checksum: string;
  order: number;
}

@Injectable()
export class MigrationLoaderService {
  private readonly logger = new Logger(MigrationLoaderService.name);
  readonly migrationsPath: string;

  constructor(configService: ConfigService) {
    // Relative paths resolve against the working directory (repository root)
    this.migrationsPath = path.resolve(
      configService.get<string>('migrationsDir', 'libs/sql/migrations'),
    );
  }

  /**
   * Read every .sql file, lexicographically ordered (001_, 002_, ...)
   */
  async loadMigrations(): Promise<Migration[]> {
    const files = await fs.readdir(this.migrationsPath);
    const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

    const migrations: Migration[] = [];
    for (const [i, filename] of sqlFiles.entries()) {
      const sql = await fs.readFile(path.join(this.migrationsPath, filename), 'utf8');
      const checksum = this.calculateChecksum(sql);

      migrations.push({
        name: filename.replace(/\.sql$/, ''),
        filename,
        sql,
        checksum,
        order: i + 1,
      });

      this.logger.debug(`Loaded migration: ${filename} (checksum: ${checksum.substring(0, 8)}...)`);
    }

    this.logger.log(`Loaded ${migrations.length} migrations from ${this.migrationsPath}`);
    return migrations;
  }

  private calculateChecksum(content: string): string {
    return crypto.createHash('sha256').update(content).digest('hex');
  }
}

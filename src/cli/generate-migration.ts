#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { assertTableName } from '../adapters/delivery-row';

const USAGE = 'Usage: delivery-monitor generate-migration <tableName>';

export function generateMigration(tableName: string): string {
  assertTableName(tableName);
  const logTable = `${tableName}_maintenance_log`;

  return `-- migrate:up
CREATE TABLE ${tableName} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    coffee_type TEXT NOT NULL,
    group_number INTEGER NOT NULL,
    status TEXT NOT NULL,
    trigger_type TEXT NOT NULL,
    started_at TIMESTAMPTZ NOT NULL,
    completed_at TIMESTAMPTZ,
    error_message TEXT,
    retroactive BOOLEAN NOT NULL DEFAULT FALSE
);

CREATE UNIQUE INDEX idx_${tableName}_open_group
    ON ${tableName} (group_number)
    WHERE status IN ('started', 'in_progress');

CREATE INDEX idx_${tableName}_trigger_started
    ON ${tableName} (trigger_type, started_at);

CREATE TABLE ${logTable} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    log_type TEXT NOT NULL,
    group_number INTEGER,
    message TEXT NOT NULL,
    resolved BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${logTable}_created_at
    ON ${logTable} (created_at);

-- migrate:down
DROP TABLE IF EXISTS ${logTable};
DROP TABLE IF EXISTS ${tableName};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      `${USAGE}\n\n` +
        'Generates a dbmate-compatible SQL migration for the delivery record table\n' +
        'and its maintenance log.\n\n' +
        'Arguments:\n' +
        '  tableName    The database table name (alphanumeric and underscores only)\n\n' +
        'Example:\n' +
        '  npx delivery-monitor generate-migration coffee_deliveries',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tableName = args[1];
  if (!tableName) {
    console.error('Error: tableName argument is required.');
    console.error(USAGE);
    process.exit(1);
  }

  const sql = generateMigration(tableName);

  const migrationsDir = path.resolve('db', 'migrations');
  fs.mkdirSync(migrationsDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const filePath = path.join(migrationsDir, `${timestamp}_create_${tableName}.sql`);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}

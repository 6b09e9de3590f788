#!/usr/bin/env tsx
/**
 * Database Setup Script
 *
 * Creates the PostgreSQL database if it doesn't exist, then creates the
 * entities table and its indexes from sql/entities.sql.
 *
 * Usage:
 *   npm run db:setup
 */

import 'dotenv/config';
import pg from 'pg';
import { censorDatabaseUrl, loadDatabaseConfig } from '../src/config/database.js';
import { ensureEntitySchema } from '../src/entities/postgres/schema.js';

const { Client } = pg;

function parseDatabaseUrl(url: string) {
  const urlObj = new URL(url);
  return {
    host: urlObj.hostname,
    port: urlObj.port || '5432',
    user: urlObj.username,
    password: urlObj.password,
    database: urlObj.pathname.slice(1),
  };
}

async function createDatabaseIfMissing(databaseUrl: string): Promise<void> {
  const dbConfig = parseDatabaseUrl(databaseUrl);
  console.log(`📋 Database: ${dbConfig.database} on ${dbConfig.host}:${dbConfig.port}\n`);

  // CREATE DATABASE has to run from the maintenance database
  const maintenanceUrl = new URL(databaseUrl);
  maintenanceUrl.pathname = '/postgres';
  const client = new Client({ connectionString: maintenanceUrl.toString() });

  try {
    await client.connect();

    const checkResult = await client.query('SELECT 1 FROM pg_database WHERE datname = $1', [
      dbConfig.database,
    ]);

    if (checkResult.rows.length > 0) {
      console.log(`ℹ️  Database "${dbConfig.database}" already exists.`);
    } else {
      const databaseIdentifier = `"${dbConfig.database.replace(/"/g, '""')}"`;
      await client.query(`CREATE DATABASE ${databaseIdentifier}`);
      console.log(`✅ Database "${dbConfig.database}" created.`);
    }
  } finally {
    await client.end();
  }
}

async function createSchema(databaseUrl: string): Promise<void> {
  const client = new Client({ connectionString: databaseUrl });
  try {
    await client.connect();
    await ensureEntitySchema(client);
    console.log('✅ Table "entities" is ready.\n');
  } finally {
    await client.end();
  }
}

async function main() {
  console.log('🚀 Database Setup Script\n');

  const { databaseUrl } = loadDatabaseConfig();
  console.log(`🔌 ${censorDatabaseUrl(databaseUrl)}`);

  await createDatabaseIfMissing(databaseUrl);
  await createSchema(databaseUrl);

  console.log('🎉 Database setup complete! Verify with: npm run health\n');
}

main().catch((error) => {
  console.error('\n❌ Database setup failed:');
  if (error instanceof Error) {
    console.error('Message:', error.message);

    if (error.message.includes('ECONNREFUSED')) {
      console.error('\n💡 Hint: PostgreSQL server is not running or not accessible.');
    } else if (error.message.includes('permission denied to create database')) {
      console.error('\n💡 Hint: Grant the user CREATEDB or use a superuser account.');
    }
  } else {
    console.error(error);
  }
  process.exit(1);
});

#!/usr/bin/env node

import pg from 'pg';
import { getConfig } from '../config/index.js';
import { applySchema } from './schema.js';

const { Pool } = pg;

async function migrate() {
  console.log('Running database migrations...');

  const config = getConfig();

  const pool = new Pool({
    host: config.postgres.host,
    port: config.postgres.port,
    database: config.postgres.database,
    user: config.postgres.user,
    password: config.postgres.password,
  });

  try {
    const tables = await applySchema(pool);

    console.log('Migrations completed successfully!');
    console.log('\nTables:');
    for (const table of tables) {
      console.log(`  - ${table}`);
    }
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

await migrate();

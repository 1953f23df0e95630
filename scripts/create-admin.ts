/**
 * Create an admin user. Admins bypass the subscription check and cannot be created through the API.
 *
 * Usage:
 *   node dist/scripts/create-admin.js
 *
 * Environment variables:
 *   - DATABASE_URL or PGHOST/PGDATABASE/etc (PostgreSQL connection)
 *   - SECRET_KEY (required by the config loader)
 */

import dotenv from 'dotenv';
import * as readline from 'readline/promises';
import { loadConfig } from '../src/config.js';
import { initPool, createSchema, closePool, createUser, getUserByEmail } from '../src/db/db_sql.js';
import { hashPassword } from '../src/common/passwords.js';
import { EmailSchema, NameSchema, PasswordSchema } from '../src/common/validation.js';

dotenv.config();

async function main() {
  const config = loadConfig();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  initPool(config.postgres);
  try {
    await createSchema();

    const email = EmailSchema.parse(await rl.question('Admin email: '));
    const existing = await getUserByEmail(email);
    if (existing) {
      console.log(`User ${email} already exists (role: ${existing.role}). Nothing to do.`);
      return;
    }
    const name = NameSchema.parse(await rl.question('Admin name: '));
    const password = PasswordSchema.parse(await rl.question('Admin password: '));

    const user = await createUser({
      email,
      name,
      role: 'admin',
      password_hash: await hashPassword(password),
    });
    console.log(`Created admin ${user.email} (${user.id})`);
  } finally {
    rl.close();
    await closePool();
  }
}

main().catch((error) => {
  console.error('Error creating admin:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});

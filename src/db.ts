import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from './logger';

let database: Database.Database | undefined;

const migrations: string[] = [
  `CREATE TABLE IF NOT EXISTS voucher_creation_requests (
      payment_hash TEXT PRIMARY KEY,
      lightning_address TEXT NOT NULL,
      count INTEGER NOT NULL,
      expiry_seconds INTEGER NOT NULL,
      fee_msats INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      created_at TEXT NOT NULL
    );`,
  `CREATE TABLE IF NOT EXISTS vouchers (
      pay_id TEXT PRIMARY KEY,
      withdraw_id TEXT NOT NULL UNIQUE,
      creation_request_hash TEXT,
      lightning_address TEXT NOT NULL,
      total_paid_msats INTEGER NOT NULL DEFAULT 0 CHECK (total_paid_msats >= 0),
      last_funded_at TEXT,
      expiry_seconds INTEGER NOT NULL,
      active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      FOREIGN KEY(creation_request_hash) REFERENCES voucher_creation_requests(payment_hash)
    );`,
  `CREATE INDEX IF NOT EXISTS vouchers_creation_hash_idx ON vouchers(creation_request_hash);`,
  `CREATE INDEX IF NOT EXISTS vouchers_refund_idx ON vouchers(active, total_paid_msats, last_funded_at, created_at);`,
  `CREATE TABLE IF NOT EXISTS pay_invoices (
      id TEXT PRIMARY KEY,
      pay_id TEXT NOT NULL,
      payment_hash TEXT NOT NULL UNIQUE,
      amount_msats INTEGER NOT NULL,
      credited_msats INTEGER NOT NULL,
      paid INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      paid_at TEXT,
      FOREIGN KEY(pay_id) REFERENCES vouchers(pay_id)
    );`,
  `CREATE INDEX IF NOT EXISTS pay_invoices_pay_id_idx ON pay_invoices(pay_id);`,
  `CREATE TABLE IF NOT EXISTS withdraw_sessions (
      k1 TEXT PRIMARY KEY,
      withdraw_id TEXT NOT NULL,
      used INTEGER NOT NULL DEFAULT 0,
      outcome TEXT,
      created_at TEXT NOT NULL,
      used_at TEXT,
      FOREIGN KEY(withdraw_id) REFERENCES vouchers(withdraw_id)
    );`,
  `CREATE INDEX IF NOT EXISTS withdraw_sessions_withdraw_id_idx ON withdraw_sessions(withdraw_id);`,
  // payment hashes are gateway idempotency keys across both invoice tables
  `CREATE TRIGGER IF NOT EXISTS pay_invoices_unique_hash
     BEFORE INSERT ON pay_invoices
     WHEN EXISTS (SELECT 1 FROM voucher_creation_requests WHERE payment_hash = NEW.payment_hash)
     BEGIN
       SELECT RAISE(ABORT, 'DUPLICATE_PAYMENT_HASH');
     END;`,
  `CREATE TRIGGER IF NOT EXISTS creation_requests_unique_hash
     BEFORE INSERT ON voucher_creation_requests
     WHEN EXISTS (SELECT 1 FROM pay_invoices WHERE payment_hash = NEW.payment_hash)
     BEGIN
       SELECT RAISE(ABORT, 'DUPLICATE_PAYMENT_HASH');
     END;`,
];

const ensureStorageDir = (databasePath: string) => {
  if (databasePath === ':memory:') {
    return;
  }
  fs.mkdirSync(path.dirname(databasePath), { recursive: true });
};

const runMigrations = (db: Database.Database) => {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  const migrationTransaction = db.transaction(() => {
    migrations.forEach((statement) => {
      db.prepare(statement).run();
    });
  });
  migrationTransaction();
};

/** Opens a database file (or `:memory:`) and brings its schema up to date. */
export const openDatabase = (databasePath: string) => {
  ensureStorageDir(databasePath);
  const db = new Database(databasePath);
  runMigrations(db);
  return db;
};

export const getDatabase = (databasePath: string) => {
  if (database) {
    return database;
  }
  database = openDatabase(databasePath);
  logger.info('Database ready', { path: databasePath });
  return database;
};

export const closeDatabase = () => {
  if (!database) {
    return;
  }
  database.close();
  database = undefined;
};

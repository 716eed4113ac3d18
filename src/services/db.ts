import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY_DATABASE = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tenants (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    slug TEXT NOT NULL UNIQUE,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS external_agents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    base_url TEXT NOT NULL,
    enabled INTEGER NOT NULL DEFAULT 1,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tenant_id INTEGER NOT NULL,
    product_id TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    delivery_type TEXT NOT NULL DEFAULT 'guaranteed',
    cpm REAL,
    FOREIGN KEY(tenant_id) REFERENCES tenants(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_products_tenant ON products(tenant_id);
`;

/**
 * Open (or create) the registry database and apply the schema.
 * Pass {@link IN_MEMORY_DATABASE} for a throwaway database.
 */
export function createDatabase(filePath: string): Database.Database {
  if (filePath !== IN_MEMORY_DATABASE) {
    const directory = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
  }

  const db = new Database(filePath);
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

export interface TenantInput {
  name: string;
  slug: string;
}

export interface ProductInput {
  productId: string;
  name: string;
  description?: string;
  deliveryType?: string;
  cpm?: number | null;
}

export interface ExternalAgentInput {
  name: string;
  baseUrl: string;
  enabled?: boolean;
}

export function insertTenant(db: Database.Database, input: TenantInput): number {
  const result = db
    .prepare('INSERT INTO tenants (name, slug) VALUES (?, ?)')
    .run(input.name, input.slug);
  return Number(result.lastInsertRowid);
}

export function insertProduct(db: Database.Database, tenantId: number, input: ProductInput): void {
  db.prepare(
    `INSERT INTO products (tenant_id, product_id, name, description, delivery_type, cpm)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    tenantId,
    input.productId,
    input.name,
    input.description ?? '',
    input.deliveryType ?? 'guaranteed',
    input.cpm ?? null,
  );
}

export function insertExternalAgent(db: Database.Database, input: ExternalAgentInput): number {
  const result = db
    .prepare('INSERT INTO external_agents (name, base_url, enabled) VALUES (?, ?, ?)')
    .run(input.name, input.baseUrl, input.enabled === false ? 0 : 1);
  return Number(result.lastInsertRowid);
}

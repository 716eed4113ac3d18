import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import {
  IN_MEMORY_DATABASE,
  createDatabase,
  insertExternalAgent,
  insertProduct,
  insertTenant,
} from '../../src/services/db.js';
import { SqliteAgentRegistry } from '../../src/services/agent-registry.js';

describe('SqliteAgentRegistry', () => {
  let db: Database.Database;
  let registry: SqliteAgentRegistry;

  beforeEach(() => {
    db = createDatabase(IN_MEMORY_DATABASE);
    registry = new SqliteAgentRegistry(db);

    const zeta = insertTenant(db, { name: 'Zeta Sports', slug: 'zeta' });
    const alpha = insertTenant(db, { name: 'Alpha News', slug: 'alpha' });
    insertProduct(db, zeta, { productId: 'z-2', name: 'Match Day Takeover', cpm: 25 });
    insertProduct(db, zeta, { productId: 'z-1', name: 'Highlights Pre-roll', description: 'Video', deliveryType: 'non_guaranteed' });
    insertProduct(db, alpha, { productId: 'a-1', name: 'Front Page Banner' });

    insertExternalAgent(db, { name: 'Partner B', baseUrl: 'https://b.example.com/rank' });
    insertExternalAgent(db, { name: 'Partner A', baseUrl: 'https://a.example.com/rank' });
    insertExternalAgent(db, { name: 'Partner Off', baseUrl: 'https://off.example.com/rank', enabled: false });
  });

  afterEach(() => {
    db.close();
  });

  it('checks tenant existence by slug', async () => {
    expect(await registry.tenantExists('zeta')).toBe(true);
    expect(await registry.tenantExists('ghost-pub')).toBe(false);
  });

  it('lists tenant slugs ordered by tenant name', async () => {
    expect(await registry.listTenantSlugs()).toEqual(['alpha', 'zeta']);
  });

  it('lists only enabled external agents, ordered by name', async () => {
    expect(await registry.listEnabledExternalAgents()).toEqual([
      { name: 'Partner A', url: 'https://a.example.com/rank' },
      { name: 'Partner B', url: 'https://b.example.com/rank' },
    ]);
  });

  it('lists a tenant catalogue in insertion order', async () => {
    expect(await registry.listProductsForTenant('zeta')).toEqual([
      { productId: 'z-2', name: 'Match Day Takeover', description: '', deliveryType: 'guaranteed', cpm: 25 },
      { productId: 'z-1', name: 'Highlights Pre-roll', description: 'Video', deliveryType: 'non_guaranteed', cpm: null },
    ]);
    expect(await registry.listProductsForTenant('ghost-pub')).toEqual([]);
  });

  it('rejects duplicate tenant slugs', () => {
    expect(() => insertTenant(db, { name: 'Other', slug: 'zeta' })).toThrow(/UNIQUE/);
  });
});

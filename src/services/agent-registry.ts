import type Database from 'better-sqlite3';
import type { ExternalAgentRecord } from '../types/orchestration.js';
import type { ProductRecord } from './ranking-provider.js';

/** Read-only view of tenants and external agents consumed by the orchestrator. */
export interface AgentRegistry {
    tenantExists(slug: string): Promise<boolean>;
    listTenantSlugs(): Promise<string[]>;
    listEnabledExternalAgents(): Promise<ExternalAgentRecord[]>;
}

/** Product lookup consumed by the internal ranking endpoint. */
export interface ProductCatalog {
    tenantExists(slug: string): Promise<boolean>;
    listProductsForTenant(slug: string): Promise<ProductRecord[]>;
}

interface ProductRow {
    product_id: string;
    name: string;
    description: string;
    delivery_type: string;
    cpm: number | null;
}

export class SqliteAgentRegistry implements AgentRegistry, ProductCatalog {
    readonly #db: Database.Database;

    constructor(db: Database.Database) {
        this.#db = db;
    }

    async tenantExists(slug: string): Promise<boolean> {
        const row = this.#db.prepare('SELECT 1 AS found FROM tenants WHERE slug = ?').get(slug);
        return row !== undefined;
    }

    async listTenantSlugs(): Promise<string[]> {
        const rows = this.#db
            .prepare<[], { slug: string }>('SELECT slug FROM tenants ORDER BY name, id')
            .all();
        return rows.map((row) => row.slug);
    }

    async listEnabledExternalAgents(): Promise<ExternalAgentRecord[]> {
        const rows = this.#db
            .prepare<[], { name: string; base_url: string }>(
                'SELECT name, base_url FROM external_agents WHERE enabled = 1 ORDER BY name, id',
            )
            .all();
        return rows.map((row) => ({ name: row.name, url: row.base_url }));
    }

    async listProductsForTenant(slug: string): Promise<ProductRecord[]> {
        const rows = this.#db
            .prepare<[string], ProductRow>(
                `SELECT p.product_id, p.name, p.description, p.delivery_type, p.cpm
                 FROM products p
                 JOIN tenants t ON t.id = p.tenant_id
                 WHERE t.slug = ?
                 ORDER BY p.id`,
            )
            .all(slug);

        return rows.map((row) => ({
            productId: row.product_id,
            name: row.name,
            description: row.description,
            deliveryType: row.delivery_type,
            cpm: row.cpm,
        }));
    }
}

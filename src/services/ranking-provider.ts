import type { RankedItem } from '../types/orchestration.js';

export interface ProductRecord {
    productId: string;
    name: string;
    description: string;
    deliveryType: string;
    cpm: number | null;
}

export interface RankProductsInput {
    brief: string;
    products: ProductRecord[];
}

/** Ranks one tenant's catalogue against a brief. Implementations throw the errors below. */
export interface RankingProvider {
    readonly name: string;
    rankProducts(input: RankProductsInput): Promise<RankedItem[]>;
}

/** Provider is not usable (missing credentials, bad model settings). */
export class AiConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AiConfigError';
    }
}

/** Provider call failed or returned something unusable. */
export class AiRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AiRequestError';
    }
}

export class AiTimeoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AiTimeoutError';
    }
}

export class NoProductsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NoProductsError';
    }
}

const MIN_TERM_LENGTH = 3;

function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter((token) => token.length >= MIN_TERM_LENGTH);
}

/**
 * Deterministic term-overlap ranker.
 *
 * Score is the share of distinct brief terms found in a product's name,
 * description or delivery type. Products matching nothing are left out.
 */
export class KeywordRankingProvider implements RankingProvider {
    readonly name = 'keyword';

    async rankProducts(input: RankProductsInput): Promise<RankedItem[]> {
        const terms = [...new Set(tokenize(input.brief))];
        if (terms.length === 0) {
            return [];
        }

        const scored = input.products.map((product) => {
            const haystack = new Set(
                tokenize(`${product.name} ${product.description} ${product.deliveryType}`),
            );
            const matched = terms.filter((term) => haystack.has(term));
            return {
                product,
                matched,
                score: Math.round((matched.length / terms.length) * 100) / 100,
            };
        });

        return scored
            .filter((entry) => entry.matched.length > 0)
            .sort((a, b) => b.score - a.score)
            .map((entry) => ({
                product_id: entry.product.productId,
                reason: `Matches brief terms: ${entry.matched.join(', ')}`,
                score: entry.score,
            }));
    }
}

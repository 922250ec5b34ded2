import * as crypto from 'crypto';

/**
 * SHA-256 hex digest of the exact UTF-8 bytes of `text`. No normalization.
 */
export function hashText(text: string): string {
    return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * JSON serialization with object keys sorted at every depth, so two
 * structurally equal values always serialize to the same string.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const sorted: Record<string, unknown> = {};
        for (const [key, child] of entries) {
            sorted[key] = sortKeys(child);
        }
        return sorted;
    }
    return value;
}

/**
 * Current UTC time as `YYYY-MM-DDTHH:mm:ss.sssZ`.
 */
export function isoNow(now: Date = new Date()): string {
    return now.toISOString();
}

export function hashPrefix(hash: string, length: number = 16): string {
    return hash.slice(0, length);
}

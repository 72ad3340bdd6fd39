/**
 * Credential Pool
 *
 * Ordered, read-only list of accounts that topics are posted from.
 * Built once at startup from USERn_API_KEY / USERn_USERNAME pairs, ordered by n.
 * Falls back to the primary API_KEY / API_USERNAME when no pool members are defined.
 */

import type { Env } from '../config.js';
import { ConfigurationError } from '../errors.js';

export interface Credential {
    readonly username: string;
    readonly apiKey: string;
}

export type CredentialPool = readonly Credential[];

const MEMBER_PATTERN = /^USER(\d+)_(API_KEY|USERNAME)$/;

interface MemberVars {
    apiKey?: string;
    username?: string;
}

function collectMembers(env: Env): Map<number, MemberVars> {
    const members = new Map<number, MemberVars>();
    for (const [key, value] of Object.entries(env)) {
        const match = MEMBER_PATTERN.exec(key);
        if (!match || value === undefined) continue;

        const n = Number(match[1]);
        const member = members.get(n) ?? {};
        if (match[2] === 'API_KEY') {
            member.apiKey = value;
        } else {
            member.username = value;
        }
        members.set(n, member);
    }
    return members;
}

export function loadCredentialPool(env: Env): CredentialPool {
    const members = collectMembers(env);
    const problems: string[] = [];
    const pool: Credential[] = [];

    const ordered = [...members.entries()].sort(([a], [b]) => a - b);
    for (const [n, member] of ordered) {
        const apiKey = member.apiKey?.trim() ?? '';
        const username = member.username?.trim() ?? '';
        // Both blank: a template slot left unfilled, not a member.
        if (!apiKey && !username) continue;
        if (!apiKey) problems.push(`USER${n}_API_KEY is missing or empty`);
        if (!username) problems.push(`USER${n}_USERNAME is missing or empty`);
        if (apiKey && username) pool.push(Object.freeze({ username, apiKey }));
    }

    if (problems.length > 0) {
        throw new ConfigurationError(
            `Invalid credential pool:\n${problems.map((p) => `  - ${p}`).join('\n')}`,
            problems
        );
    }

    if (pool.length === 0) {
        const apiKey = env.API_KEY?.trim() ?? '';
        const username = env.API_USERNAME?.trim() ?? '';
        if (!apiKey || !username) {
            throw new ConfigurationError(
                'No credentials configured: define USERn_API_KEY/USERn_USERNAME pairs or API_KEY/API_USERNAME'
            );
        }
        pool.push(Object.freeze({ username, apiKey }));
    }

    return Object.freeze(pool);
}

/**
 * Mask an API key for display, keeping only its last four characters.
 */
export function maskKey(apiKey: string): string {
    if (apiKey.length <= 4) return '****';
    return `${'*'.repeat(Math.min(apiKey.length - 4, 8))}${apiKey.slice(-4)}`;
}

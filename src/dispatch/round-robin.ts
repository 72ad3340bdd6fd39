/**
 * Round-Robin Dispatcher
 *
 * Topic i is always posted with pool[i mod pool.length]. Assignment depends on
 * position only, so a failed submission never shifts later topics onto another account.
 */

import type { Credential, CredentialPool } from '../credentials/pool.js';
import { ConfigurationError } from '../errors.js';
import type { TopicRequest } from '../topics/types.js';

export interface DispatchRecord {
    readonly topic: TopicRequest;
    readonly credential: Credential;
    readonly attemptIndex: number;
}

export function credentialFor(index: number, pool: CredentialPool): Credential {
    const credential = pool[index % pool.length];
    if (!credential) {
        throw new ConfigurationError('Credential pool is empty');
    }
    return credential;
}

export function assignCredentials(topics: readonly TopicRequest[], pool: CredentialPool): DispatchRecord[] {
    if (pool.length === 0) {
        throw new ConfigurationError('Credential pool is empty');
    }
    return topics.map((topic, attemptIndex) => ({
        topic,
        credential: credentialFor(attemptIndex, pool),
        attemptIndex,
    }));
}

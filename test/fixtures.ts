import type { Credential } from '../src/credentials/pool.js';
import type { SubmissionResult } from '../src/discourse/client.js';
import type { DispatchRecord } from '../src/dispatch/round-robin.js';
import type { TopicRequest } from '../src/topics/types.js';

export const alice: Credential = { username: 'alice', apiKey: 'test-key-alice' };
export const bob: Credential = { username: 'bob', apiKey: 'test-key-bob' };
export const carol: Credential = { username: 'carol', apiKey: 'test-key-carol' };

export function makeTopic(overrides: Partial<TopicRequest> = {}): TopicRequest {
    return {
        sourceIndex: 0,
        title: 'Test topic',
        body: 'Test body',
        category: 1,
        imagePosition: 'end',
        ...overrides,
    };
}

export function makeRecord(attemptIndex: number, credential: Credential = alice): DispatchRecord {
    return {
        topic: makeTopic({ sourceIndex: attemptIndex, title: `Topic ${attemptIndex}` }),
        credential,
        attemptIndex,
    };
}

export function makeResult(topicId: number): SubmissionResult {
    return {
        success: true,
        topicId,
        postNumber: 1,
        url: `https://forum.test/t/${topicId}`,
        serverResponse: { id: topicId * 10, topic_id: topicId, post_number: 1 },
    };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

import { z } from 'zod';
import type { DispatchRecord } from '../dispatch/round-robin.js';
import type { Credential } from '../credentials/pool.js';
import { SubmissionError, errorMessage } from '../errors.js';
import { formatTopicBody } from '../topics/formatter.js';
import type { CategoryId } from '../topics/types.js';

export interface DiscourseClientOptions {
    baseUrl: string;
    timeoutMs: number;
}

export interface CreateTopicPayload {
    title: string;
    raw: string;
    category: CategoryId;
    embed_url?: string;
    external_id?: string;
    tags?: string[];
}

const createdPostSchema = z
    .object({
        id: z.number(),
        topic_id: z.number(),
        post_number: z.number(),
        topic_slug: z.string().optional(),
        username: z.string().optional(),
        created_at: z.string().optional(),
    })
    .passthrough();

export type CreatedPost = z.infer<typeof createdPostSchema>;

const errorBodySchema = z.object({
    errors: z.array(z.string()).optional(),
    error_type: z.string().optional(),
});

export interface SubmissionResult {
    success: true;
    topicId: number;
    postNumber: number;
    url: string;
    serverResponse: CreatedPost;
}

export function buildPayload(record: DispatchRecord): CreateTopicPayload {
    const { topic } = record;
    const payload: CreateTopicPayload = {
        title: topic.title,
        raw: formatTopicBody(topic),
        category: topic.category,
    };
    if (topic.embedUrl) payload.embed_url = topic.embedUrl;
    if (topic.externalId) payload.external_id = topic.externalId;
    if (topic.tags && topic.tags.length > 0) payload.tags = [...topic.tags];
    return payload;
}

/**
 * Pull a readable message out of a Discourse error response.
 */
function describeFailure(status: number, statusText: string, text: string): string {
    let body: unknown = null;
    try {
        body = JSON.parse(text);
    } catch {
        body = null;
    }
    const parsed = errorBodySchema.safeParse(body);
    if (parsed.success && parsed.data.errors && parsed.data.errors.length > 0) {
        return `HTTP ${status}: ${parsed.data.errors.join('; ')}`;
    }
    const snippet = text.trim().slice(0, 200);
    return snippet ? `HTTP ${status}: ${snippet}` : `HTTP ${status} ${statusText}`.trim();
}

export class DiscourseClient {
    private baseUrl: string;
    private timeoutMs: number;

    constructor(options: DiscourseClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
    }

    private async post(path: string, credential: Credential, body: object): Promise<unknown> {
        const url = `${this.baseUrl}${path}`;
        let response: Response;
        try {
            response = await fetch(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Api-Key': credential.apiKey,
                    'Api-Username': credential.username,
                },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            const timedOut = error instanceof Error && error.name === 'TimeoutError';
            const message = timedOut
                ? `Request timed out after ${this.timeoutMs}ms`
                : `Request failed: ${errorMessage(error)}`;
            throw new SubmissionError(message, 'network');
        }

        if (!response.ok) {
            const text = await response.text().catch(() => '');
            throw new SubmissionError(
                describeFailure(response.status, response.statusText, text),
                SubmissionError.kindForStatus(response.status),
                response.status
            );
        }
        const { status } = response;
        return await response.json().catch(() => {
            throw new SubmissionError(`HTTP ${status}: response is not JSON`, 'server', status);
        });
    }

    topicUrl(post: CreatedPost): string {
        return post.topic_slug
            ? `${this.baseUrl}/t/${post.topic_slug}/${post.topic_id}`
            : `${this.baseUrl}/t/${post.topic_id}`;
    }

    /**
     * Create one topic, authenticated as the record's credential.
     */
    async createTopic(record: DispatchRecord): Promise<SubmissionResult> {
        const data = await this.post('/posts.json', record.credential, buildPayload(record));
        const parsed = createdPostSchema.safeParse(data);
        if (!parsed.success) {
            throw new SubmissionError('Unexpected response from Discourse: missing topic_id or post_number', 'server');
        }
        return {
            success: true,
            topicId: parsed.data.topic_id,
            postNumber: parsed.data.post_number,
            url: this.topicUrl(parsed.data),
            serverResponse: parsed.data,
        };
    }
}

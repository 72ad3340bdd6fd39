/**
 * Topic Source
 *
 * Reads the batch file: a JSON array of topic objects, kept in file order.
 * Invalid entries are returned as rejected rather than failing the whole file.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { MalformedInputError, errorMessage } from '../errors.js';
import type { Formatting, FormattingFlags, LoadedTopics, RejectedTopic, TopicRequest } from './types.js';

const topicEntrySchema = z.object({
    title: z.string().trim().min(1, 'must not be empty'),
    body: z.string(),
    category: z.union([z.number().int().nonnegative(), z.string().trim().min(1)]),
    image: z.string().nullish(),
    image_url: z.string().nullish(),
    image_position: z.string().nullish(),
    formatting: z.unknown(),
    embed_url: z.string().nullish(),
    external_id: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
});

type TopicEntry = z.infer<typeof topicEntrySchema>;

const FLAG_NAMES = ['bold', 'italic', 'header'] as const;

/**
 * Strings pass through as a mode; objects keep only the flags set to `true`.
 */
function toFormatting(value: unknown): Formatting | undefined {
    if (typeof value === 'string') return value;
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;

    const flags: FormattingFlags = {};
    for (const name of FLAG_NAMES) {
        if (name in value && Reflect.get(value, name) === true) flags[name] = true;
    }
    return flags;
}

function toTopicRequest(entry: TopicEntry, sourceIndex: number): TopicRequest {
    return Object.freeze({
        sourceIndex,
        title: entry.title,
        body: entry.body,
        category: entry.category,
        image: entry.image ?? entry.image_url ?? undefined,
        imagePosition: entry.image_position ?? 'end',
        formatting: toFormatting(entry.formatting),
        embedUrl: entry.embed_url ?? undefined,
        externalId: entry.external_id ?? undefined,
        tags: entry.tags ?? undefined,
    });
}

function titleOf(raw: unknown): string | undefined {
    if (typeof raw === 'object' && raw !== null && 'title' in raw && typeof raw.title === 'string') {
        return raw.title;
    }
    return undefined;
}

/**
 * Validate already-parsed file content.
 */
export function parseTopics(data: unknown, path: string): LoadedTopics {
    if (!Array.isArray(data)) {
        throw new MalformedInputError(`Topic file ${path} must contain a JSON array`, path);
    }

    const topics: TopicRequest[] = [];
    const rejected: RejectedTopic[] = [];

    data.forEach((raw: unknown, index) => {
        const result = topicEntrySchema.safeParse(raw);
        if (result.success) {
            topics.push(toTopicRequest(result.data, index));
            return;
        }
        const reason = result.error.issues
            .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        rejected.push({ sourceIndex: index, title: titleOf(raw), reason });
    });

    return { topics, rejected };
}

export async function loadTopics(path: string): Promise<LoadedTopics> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        throw new MalformedInputError(`Cannot read topic file ${path}: ${errorMessage(error)}`, path);
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        throw new MalformedInputError(`Topic file ${path} is not valid JSON: ${errorMessage(error)}`, path);
    }

    return parseTopics(data, path);
}

/**
 * `'start'`, `'end'` or `'inline'`; any other value inserts no image.
 */
export type ImagePosition = string;

export interface FormattingFlags {
    bold?: boolean;
    italic?: boolean;
    header?: boolean;
}

/**
 * A mode string (`'markdown'`, `'raw'` or anything else) sends the body as written; flags wrap it.
 */
export type Formatting = string | FormattingFlags;

export type CategoryId = number | string;

export interface TopicRequest {
    readonly sourceIndex: number;
    readonly title: string;
    readonly body: string;
    readonly category: CategoryId;
    readonly image?: string;
    readonly imagePosition: ImagePosition;
    readonly formatting?: Formatting;
    readonly embedUrl?: string;
    readonly externalId?: string;
    readonly tags?: readonly string[];
}

export interface RejectedTopic {
    sourceIndex: number;
    title?: string;
    reason: string;
}

export interface LoadedTopics {
    topics: readonly TopicRequest[];
    rejected: RejectedTopic[];
}

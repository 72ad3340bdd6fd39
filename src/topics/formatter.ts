/**
 * Topic Formatter
 *
 * Builds the `raw` markdown sent to Discourse: formatting flags first, then the image.
 */

import type { Formatting, ImagePosition, TopicRequest } from './types.js';

export const IMAGE_PLACEHOLDER = '[IMAGE]';

export function applyFormatting(body: string, formatting?: Formatting): string {
    if (!formatting || typeof formatting === 'string') return body;

    let text = body;
    if (formatting.bold) text = `**${text}**`;
    if (formatting.italic) text = `*${text}*`;
    if (formatting.header) text = `# ${text}`;
    return text;
}

export function insertImage(body: string, imageUrl: string, position: ImagePosition): string {
    const image = `![Image](${imageUrl})`;
    switch (position) {
        case 'start':
            return `${image}\n\n${body}`;
        case 'inline':
            return body.split(IMAGE_PLACEHOLDER).join(image);
        case 'end':
            return `${body}\n\n${image}`;
        default:
            return body;
    }
}

export function formatTopicBody(topic: TopicRequest): string {
    const formatted = applyFormatting(topic.body, topic.formatting);
    return topic.image ? insertImage(formatted, topic.image, topic.imagePosition) : formatted;
}

import { describe, expect, it } from 'vitest';
import { applyFormatting, formatTopicBody, insertImage } from '../../src/topics/formatter.js';
import { makeTopic } from '../fixtures.js';

describe('applyFormatting', () => {
    it('leaves the body alone without flags', () => {
        expect(applyFormatting('Hello')).toBe('Hello');
        expect(applyFormatting('Hello', 'raw')).toBe('Hello');
        expect(applyFormatting('Hello', 'markdown')).toBe('Hello');
        expect(applyFormatting('Hello', {})).toBe('Hello');
        expect(applyFormatting('Hello', 'html')).toBe('Hello');
    });

    it('applies bold, then italic, then header', () => {
        expect(applyFormatting('Hello', { bold: true })).toBe('**Hello**');
        expect(applyFormatting('Hello', { italic: true })).toBe('*Hello*');
        expect(applyFormatting('Hello', { header: true })).toBe('# Hello');
        expect(applyFormatting('Hello', { bold: true, italic: true, header: true })).toBe('# ***Hello***');
    });
});

describe('insertImage', () => {
    const url = 'https://cdn.test/pic.png';

    it('places the image at the start or end', () => {
        expect(insertImage('Body', url, 'start')).toBe(`![Image](${url})\n\nBody`);
        expect(insertImage('Body', url, 'end')).toBe(`Body\n\n![Image](${url})`);
    });

    it('replaces every placeholder inline', () => {
        expect(insertImage('A [IMAGE] B [IMAGE]', url, 'inline')).toBe(`A ![Image](${url}) B ![Image](${url})`);
    });

    it('inserts no image for an unknown position', () => {
        expect(insertImage('Body', url, 'middle')).toBe('Body');
    });

    it('leaves the body unchanged inline when there is no placeholder', () => {
        expect(insertImage('No slot here', url, 'inline')).toBe('No slot here');
    });
});

describe('formatTopicBody', () => {
    it('formats before inserting the image', () => {
        const topic = makeTopic({
            body: 'Big news',
            formatting: { header: true },
            image: 'https://cdn.test/pic.png',
            imagePosition: 'end',
        });

        expect(formatTopicBody(topic)).toBe('# Big news\n\n![Image](https://cdn.test/pic.png)');
    });

    it('returns the body as written when nothing applies', () => {
        expect(formatTopicBody(makeTopic({ body: 'Plain' }))).toBe('Plain');
    });
});

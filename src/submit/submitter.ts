/**
 * Post Submitter
 *
 * Sends one creation request per dispatch record. Requests may overlap up to the
 * configured concurrency, but outcomes are handed back strictly in dispatch order.
 * Failures are returned, not thrown, and are never retried.
 */

import PQueue from 'p-queue';
import type { SubmissionResult } from '../discourse/client.js';
import type { DispatchRecord } from '../dispatch/round-robin.js';
import { SubmissionError, errorMessage } from '../errors.js';

export interface TopicCreator {
    createTopic(record: DispatchRecord): Promise<SubmissionResult>;
}

export type SubmissionOutcome =
    | { ok: true; record: DispatchRecord; result: SubmissionResult }
    | { ok: false; record: DispatchRecord; error: SubmissionError };

export interface SubmitterOptions {
    concurrency: number;
    /** Minimum spacing between request starts, 0 for none. */
    delayMs: number;
}

function toSubmissionError(error: unknown): SubmissionError {
    if (error instanceof SubmissionError) return error;
    return new SubmissionError(errorMessage(error), 'network');
}

export class PostSubmitter {
    private queue: PQueue;

    constructor(private client: TopicCreator, options: SubmitterOptions) {
        this.queue = options.delayMs > 0
            ? new PQueue({ concurrency: options.concurrency, interval: options.delayMs, intervalCap: 1 })
            : new PQueue({ concurrency: options.concurrency });
    }

    async submit(record: DispatchRecord): Promise<SubmissionOutcome> {
        try {
            const result = await this.client.createTopic(record);
            return { ok: true, record, result };
        } catch (error) {
            return { ok: false, record, error: toSubmissionError(error) };
        }
    }

    async submitAll(
        records: readonly DispatchRecord[],
        onOutcome: (outcome: SubmissionOutcome) => Promise<void> | void
    ): Promise<SubmissionOutcome[]> {
        const pending = records.map((record) =>
            this.queue.add(() => this.submit(record), { throwOnTimeout: true })
        );

        const outcomes: SubmissionOutcome[] = [];
        for (const outcome of pending) {
            const settled = await outcome;
            outcomes.push(settled);
            await onOutcome(settled);
        }
        return outcomes;
    }
}

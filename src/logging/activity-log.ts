/**
 * Activity Logger
 *
 * Append-only record of every submission attempt, one entry per topic, in dispatch order.
 * Writes go through a single chain so entries never interleave. A sink failure is
 * reported on stderr and counted; it never stops the run.
 */

import { LoggingError, errorMessage } from '../errors.js';
import type { RejectedTopic } from '../topics/types.js';
import type { ActivitySink } from './sinks.js';
import type { LogEntry, RunSummary } from './types.js';

export class ActivityLogger {
    private writeChain: Promise<void> = Promise.resolve();
    private succeeded = 0;
    private failed = 0;
    private skipped = 0;
    private loggingFailures = 0;

    constructor(
        private sink: ActivitySink,
        private now: () => Date = () => new Date()
    ) { }

    get destination(): string {
        return this.sink.description;
    }

    /**
     * Log a submission outcome. Resolves once this entry (and every earlier one) is written.
     */
    record(entry: Omit<LogEntry, 'timestamp'>): Promise<void> {
        const fullEntry: LogEntry = {
            timestamp: this.now().toISOString(),
            ...entry,
        };

        if (fullEntry.status === 'success') {
            this.succeeded++;
        } else {
            this.failed++;
        }

        this.writeChain = this.writeChain
            .then(() => this.sink.append(fullEntry))
            .catch((error: unknown) => {
                this.loggingFailures++;
                const failure = new LoggingError(
                    `Failed to write log entry for "${fullEntry.topicTitle}" to ${this.sink.description}: ${errorMessage(error)}`,
                    error
                );
                console.error(`⚠️  ${failure.message}`);
            });
        return this.writeChain;
    }

    /**
     * Note a topic file entry that was rejected before dispatch.
     */
    recordSkipped(rejected: RejectedTopic): void {
        this.skipped++;
        const label = rejected.title ? `"${rejected.title}"` : `entry #${rejected.sourceIndex}`;
        console.warn(`⚠️  Skipping ${label}: ${rejected.reason}`);
    }

    async flush(): Promise<void> {
        await this.writeChain;
    }

    summary(): RunSummary {
        return {
            total: this.succeeded + this.failed + this.skipped,
            succeeded: this.succeeded,
            failed: this.failed,
            skipped: this.skipped,
            loggingFailures: this.loggingFailures,
        };
    }

    async close(): Promise<void> {
        await this.flush();
        try {
            this.sink.close();
        } catch (error) {
            this.loggingFailures++;
            console.error(`⚠️  Failed to close activity log ${this.sink.description}: ${errorMessage(error)}`);
        }
    }
}

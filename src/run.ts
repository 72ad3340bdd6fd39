/**
 * Batch run: load config, pool and topics (any failure here is fatal and happens
 * before a single request), then dispatch, submit and log every topic.
 */

import { loadConfig, type Config, type Env } from './config.js';
import { loadCredentialPool, type CredentialPool } from './credentials/pool.js';
import { DiscourseClient } from './discourse/client.js';
import { LoggingError, errorMessage } from './errors.js';
import { assignCredentials } from './dispatch/round-robin.js';
import { ActivityLogger } from './logging/activity-log.js';
import { createActivitySink, JsonLinesFileSink, type ActivitySink } from './logging/sinks.js';
import type { RunSummary } from './logging/types.js';
import { PostSubmitter, type SubmissionOutcome, type TopicCreator } from './submit/submitter.js';
import { loadTopics } from './topics/source.js';
import type { LoadedTopics } from './topics/types.js';

export interface PreparedRun {
    config: Config;
    pool: CredentialPool;
    loaded: LoadedTopics;
}

export interface RunOverrides {
    client?: TopicCreator;
    sink?: ActivitySink;
}

export async function prepareRun(env: Env): Promise<PreparedRun> {
    const config = loadConfig(env);
    const pool = loadCredentialPool(env);
    const loaded = await loadTopics(config.TOPICS_FILE);
    return { config, pool, loaded };
}

/**
 * A log destination that cannot be opened must not stop the run; fall back to the log file.
 */
function openSink(config: Config): ActivitySink {
    try {
        return createActivitySink(config);
    } catch (error) {
        const failure = new LoggingError(`Cannot open ${config.LOG_SINK} activity log: ${errorMessage(error)}`, error);
        console.error(`⚠️  ${failure.message}; writing to ${config.LOG_FILE} instead`);
        return new JsonLinesFileSink(config.LOG_FILE);
    }
}

function describeOutcome(outcome: SubmissionOutcome, total: number): string {
    const { record } = outcome;
    const prefix = `[${record.attemptIndex + 1}/${total}]`;
    const who = `as @${record.credential.username}`;
    if (outcome.ok) {
        return `${prefix} ✓ "${record.topic.title}" ${who} → ${outcome.result.url}`;
    }
    return `${prefix} ✗ "${record.topic.title}" ${who}: [${outcome.error.kind}] ${outcome.error.message}`;
}

export async function executeRun(prepared: PreparedRun, overrides: RunOverrides = {}): Promise<RunSummary> {
    const { config, pool, loaded } = prepared;

    const client = overrides.client ?? new DiscourseClient({
        baseUrl: config.DISCOURSE_URL,
        timeoutMs: config.REQUEST_TIMEOUT_MS,
    });
    const logger = new ActivityLogger(overrides.sink ?? openSink(config));

    for (const rejected of loaded.rejected) {
        logger.recordSkipped(rejected);
    }

    const records = assignCredentials(loaded.topics, pool);
    const submitter = new PostSubmitter(client, {
        concurrency: config.SUBMIT_CONCURRENCY,
        delayMs: config.REQUEST_DELAY_MS,
    });

    console.log(`Posting ${records.length} topic(s) to ${config.DISCOURSE_URL} from ${pool.length} account(s)`);

    try {
        await submitter.submitAll(records, async (outcome) => {
            if (outcome.ok) {
                console.log(describeOutcome(outcome, records.length));
                await logger.record({
                    attemptIndex: outcome.record.attemptIndex,
                    topicTitle: outcome.record.topic.title,
                    credentialUsername: outcome.record.credential.username,
                    status: 'success',
                    topicId: outcome.result.topicId,
                    postNumber: outcome.result.postNumber,
                    url: outcome.result.url,
                });
            } else {
                console.error(describeOutcome(outcome, records.length));
                await logger.record({
                    attemptIndex: outcome.record.attemptIndex,
                    topicTitle: outcome.record.topic.title,
                    credentialUsername: outcome.record.credential.username,
                    status: 'failure',
                    errorKind: outcome.error.kind,
                    errorDetail: outcome.error.message,
                });
            }
        });
    } finally {
        await logger.close();
    }

    const summary = logger.summary();
    console.log(`Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`);
    if (summary.loggingFailures > 0) {
        console.warn(`⚠️  ${summary.loggingFailures} log write(s) failed; see errors above (${logger.destination})`);
    } else if (records.length > 0) {
        console.log(`Activity log: ${logger.destination}`);
    }
    return summary;
}

export async function runFromEnv(env: Env): Promise<RunSummary> {
    return executeRun(await prepareRun(env));
}

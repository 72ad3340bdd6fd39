import type { SubmissionErrorKind } from '../errors.js';

export type SubmissionStatus = 'success' | 'failure';

export interface LogEntry {
    timestamp: string;
    attemptIndex: number;
    topicTitle: string;
    credentialUsername: string;
    status: SubmissionStatus;
    topicId?: number;
    postNumber?: number;
    url?: string;
    errorKind?: SubmissionErrorKind;
    errorDetail?: string;
}

export interface RunSummary {
    total: number;
    succeeded: number;
    failed: number;
    skipped: number;
    loggingFailures: number;
}

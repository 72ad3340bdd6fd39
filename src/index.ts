#!/usr/bin/env node
/**
 * Discourse topic poster
 *
 * Entry point: posts every topic in TOPICS_FILE, rotating through the credential pool.
 * Exits 1 only when startup fails; individual topic failures are logged.
 */

import { ConfigurationError, MalformedInputError, errorMessage } from './errors.js';
import { runFromEnv } from './run.js';

async function main(): Promise<void> {
    console.log('📮 Topic poster starting...');

    try {
        await runFromEnv(process.env);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('Configuration error:', error.message);
        } else if (error instanceof MalformedInputError) {
            console.error('Topic file error:', error.message);
        } else {
            console.error('Fatal error:', errorMessage(error));
        }
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});

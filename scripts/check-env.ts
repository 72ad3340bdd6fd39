import { loadConfig } from '../src/config.js';
import { loadCredentialPool, maskKey } from '../src/credentials/pool.js';
import { errorMessage } from '../src/errors.js';

console.log('DISCOURSE_URL:', process.env.DISCOURSE_URL || 'MISSING');
console.log('API_USERNAME:', process.env.API_USERNAME || 'MISSING');
console.log('API_KEY:', process.env.API_KEY ? `EXISTS (${maskKey(process.env.API_KEY)})` : 'MISSING');

let ok = true;

try {
    const config = loadConfig(process.env);
    console.log('TOPICS_FILE:', config.TOPICS_FILE);
    console.log('LOG_SINK:', config.LOG_SINK === 'sqlite' ? `sqlite (${config.LOG_DB_PATH})` : `file (${config.LOG_FILE})`);
    console.log(`Submission: concurrency ${config.SUBMIT_CONCURRENCY}, delay ${config.REQUEST_DELAY_MS}ms, timeout ${config.REQUEST_TIMEOUT_MS}ms`);
} catch (error) {
    ok = false;
    console.error(errorMessage(error));
}

try {
    const pool = loadCredentialPool(process.env);
    console.log(`Credential pool (${pool.length}):`);
    pool.forEach((credential, index) => {
        console.log(`  ${index + 1}. @${credential.username} ${maskKey(credential.apiKey)}`);
    });
} catch (error) {
    ok = false;
    console.error(errorMessage(error));
}

process.exit(ok ? 0 : 1);

import { ConfigurationError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Run a command action and return the process exit code.
 *
 * Any error that escapes the action is run-level and yields 1. Per-author
 * failures are recorded by the batch driver and never reach here, so a run
 * with failed authors still exits 0.
 */
export async function runAction(action: () => Promise<void>): Promise<number> {
    try {
        await action();
        return 0;
    } catch (error) {
        const message = error instanceof ConfigurationError ? 'Invalid configuration' : 'Run failed';
        getLogger().error({ error: describeError(error) }, message);
        return 1;
    }
}

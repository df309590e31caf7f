/**
 * Test environment bootstrapper: exports the TST* variables, then runs the
 * runtests and test_control suites one after the other.
 */
import { fileURLToPath } from 'url';
import { createLogger, type ILogger, LogLevel } from '../client/core/logger';
import { applyTestEnvironment } from '../util/test-env';
import {
    createVitestLauncher,
    runSuitesSequentially,
    type SuiteLauncher,
    type TestSuite,
} from '../util/suite-runner';

function fromHere(relativePath: string): string {
    return fileURLToPath(new URL(relativePath, import.meta.url));
}

export const TEST_SUITES: readonly TestSuite[] = [
    { name: 'runtests', file: fromHere('./runtests.integration.test.ts') },
    { name: 'test_control', file: fromHere('./test_control.integration.test.ts') },
];

export const INTEGRATION_CONFIG_FILE = fromHere('../../vitest.integration.config.ts');

export interface BootstrapOptions {
    env?: NodeJS.ProcessEnv;
    launcher?: SuiteLauncher;
    logger?: ILogger;
}

/**
 * Resolves with the exit code of the last suite. The first suite's result
 * does not stop or change anything.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<number> {
    const env = options.env ?? process.env;
    const logger = options.logger ?? createLogger({ contextName: 'run-tests', logLevel: LogLevel.INFO });

    const exported = applyTestEnvironment(env);
    logger.info(`Exported ${Object.keys(exported).join(', ')}`);

    const launcher = options.launcher ?? createVitestLauncher({
        configFile: INTEGRATION_CONFIG_FILE,
        logger: logger.createChildLogger({ contextName: 'vitest' }),
    });

    const summary = await runSuitesSequentially(TEST_SUITES, { launcher, env, logger });
    return summary.exitCode;
}

/**
 * Sequential test suite runner
 *
 * Launches one vitest process per suite, one after the other, each with the
 * given environment. A failing suite never stops the ones after it.
 */

import { spawn } from 'child_process';
import { createLogger, type ILogger } from '../client/core/logger';

export interface TestSuite {
    /** Target module name, e.g. "runtests" */
    name: string;
    /** Test file handed to the runner */
    file: string;
}

/**
 * Runs one suite and resolves with its exit code
 */
export type SuiteLauncher = (suite: TestSuite, env: NodeJS.ProcessEnv) => Promise<number>;

export interface SuiteResult {
    suite: TestSuite;
    exitCode: number;
}

export interface SuiteRunSummary {
    results: SuiteResult[];
    /** Exit code of the last suite run, 0 when there were none */
    exitCode: number;
}

export interface VitestLauncherOptions {
    configFile: string;
    cwd?: string;
    logger?: ILogger;
    /** Executable and leading arguments that start vitest */
    runner?: readonly string[];
}

const DEFAULT_RUNNER = ['npx', 'vitest'] as const;

// exit code for a runner that could not be started at all
const LAUNCH_FAILURE_EXIT_CODE = 127;

export function createVitestLauncher(options: VitestLauncherOptions): SuiteLauncher {
    const logger = options.logger ?? createLogger({ contextName: 'suite-runner' });
    const [command, ...runnerArgs] = options.runner ?? DEFAULT_RUNNER;

    return (suite, env) => {
        const args = [
            ...runnerArgs,
            'run',
            suite.file,
            `--config=${options.configFile}`,
            '--reporter=verbose',
        ];
        logger.info(`Command: ${command} ${args.join(' ')}`);

        return new Promise<number>((resolve) => {
            const vitestProcess = spawn(command, args, {
                stdio: 'inherit',
                cwd: options.cwd,
                env,
            });

            vitestProcess.on('close', (code, signal) => {
                if (code === null) {
                    logger.warn(`${suite.name} terminated by ${signal ?? 'unknown signal'}`);
                }
                resolve(code ?? 1);
            });

            vitestProcess.on('error', (error) => {
                logger.error(`Failed to start ${suite.name}:`, error);
                resolve(LAUNCH_FAILURE_EXIT_CODE);
            });
        });
    };
}

export interface SuiteRunOptions {
    launcher: SuiteLauncher;
    env?: NodeJS.ProcessEnv;
    logger?: ILogger;
}

export async function runSuitesSequentially(
    suites: readonly TestSuite[],
    options: SuiteRunOptions,
): Promise<SuiteRunSummary> {
    const env = options.env ?? process.env;
    const logger = options.logger ?? createLogger({ contextName: 'suite-runner' });
    const results: SuiteResult[] = [];

    for (const suite of suites) {
        logger.info(`Running ${suite.name}: ${suite.file}`);

        let exitCode: number;
        try {
            exitCode = await options.launcher(suite, env);
        } catch (error) {
            logger.error(`${suite.name} could not be run:`, error);
            exitCode = 1;
        }

        logger.info(`${suite.name} ${exitCode === 0 ? 'passed' : `failed with exit code ${exitCode}`}`);
        results.push({ suite, exitCode });
    }

    return {
        results,
        exitCode: results.at(-1)?.exitCode ?? 0,
    };
}

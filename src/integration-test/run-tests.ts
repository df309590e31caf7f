#!/usr/bin/env tsx
/**
 * Runs the integration suites against a live server with the default test
 * environment. Takes no arguments.
 *
 * Usage:
 *   tsx src/integration-test/run-tests.ts
 */

import { bootstrap } from './bootstrap';

async function main() {
    const exitCode = await bootstrap();
    process.exit(exitCode);
}

main().catch(error => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
});

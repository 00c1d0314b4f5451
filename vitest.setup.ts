/**
 * Centralized Vitest setup for sourcewise.
 *
 * Keeps stage fallback warnings out of test output unless LOG_LEVEL asks for them.
 * Tests that assert on logging reconfigure the level themselves.
 */

import { beforeEach } from 'vitest';
import { configureLogger, parseLogLevel } from './src/telemetry/logger.js';

const TEST_LOG_LEVEL = parseLogLevel(process.env.LOG_LEVEL, 'silent');

beforeEach(() => {
  configureLogger({ level: TEST_LOG_LEVEL });
});

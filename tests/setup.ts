/**
 * Jest Test Setup
 *
 * This file runs before each test suite.
 */

import { jest } from '@jest/globals';

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.TRADEDECK_LOG_LEVEL = 'error'; // Reduce noise during tests
process.env.TRADEDECK_LOG_TO_CONSOLE = 'false';
process.env.TRADEDECK_LOG_TO_FILE = 'false';

// Global test timeout
jest.setTimeout(30000);

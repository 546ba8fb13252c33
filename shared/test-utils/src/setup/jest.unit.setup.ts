/**
 * Jest Setup
 * Sets timeout to 10 seconds and silences service logs unless LOG_LEVEL is set.
 */
import { jest } from '@jest/globals';

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.NODE_ENV = 'test';

jest.setTimeout(10000);  // 10 seconds

import { jest } from '@jest/globals';
import { config } from 'dotenv';

// Load test environment
config({ path: '.env.test' });

// Suppress console logs during tests
jest.spyOn(console, 'log').mockImplementation(() => undefined);
jest.spyOn(console, 'info').mockImplementation(() => undefined);
jest.spyOn(console, 'warn').mockImplementation(() => undefined);
jest.spyOn(console, 'error').mockImplementation(() => undefined);

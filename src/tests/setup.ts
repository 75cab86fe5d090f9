// Jest setup file for tests
import { config } from 'dotenv';

// Load test environment variables
config({ path: '.env.test' });

process.env.NODE_ENV = 'test';

// Placeholder store settings; no test opens a connection
process.env.DB_HOST = process.env.DB_HOST || 'localhost';
process.env.DB_USER = process.env.DB_USER || 'test_user';
process.env.DB_PASSWORD = process.env.DB_PASSWORD || 'test_password';
process.env.DB_NAME = process.env.DB_NAME || 'test_db';

jest.setTimeout(30000);

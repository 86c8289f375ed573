/**
 * Jest setup file.
 * Keep pino quiet unless a test run asks for logs explicitly.
 */

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

export {};

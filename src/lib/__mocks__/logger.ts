/**
 * Manual mock for logger module
 */

const createMockLogger = () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
  child: jest.fn(),
});

export const logger = createMockLogger();

export const createLambdaLogger = jest.fn(() => createMockLogger());

export const logLambdaInvocation = jest.fn();
export const logLambdaCompletion = jest.fn();
export const withContext = jest.fn((base: unknown) => base);

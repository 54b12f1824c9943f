import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  ProviderError,
  RateLimitError,
  TimeoutError,
  ScanError,
  CommitError,
  ValidationError,
  errorMessage,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProviderError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('ScanError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('subclasses', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError', 'ConfigError'],
    [new UsageError('x'), 'UsageError', 'UsageError'],
    [new ProviderError('x'), 'ProviderError', 'ProviderError'],
    [new TimeoutError('x'), 'TimeoutError', 'TimeoutError'],
    [new ScanError('x'), 'ScanError', 'ScanError'],
    [new ValidationError('x'), 'ValidationError', 'ValidationError'],
  ])('%s carries its code and name', (error, code, name) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('ProviderError keeps the HTTP status', () => {
    const error = new ProviderError('Server error', { status: 503, retryable: true });
    expect(error.status).toBe(503);
    expect(error.retryable).toBe(true);
  });

  it('RateLimitError keeps retryAfter', () => {
    const error = new RateLimitError('Slow down', { retryAfter: 30 });
    expect(error.code).toBe('RateLimitError');
    expect(error.retryAfter).toBe(30);
  });

  it('CommitError keeps the path', () => {
    const cause = new Error('EACCES');
    const error = new CommitError('/src/Main.java', 'Rename failed', { cause });
    expect(error.code).toBe('CommitError');
    expect(error.path).toBe('/src/Main.java');
    expect(error.cause).toBe(cause);
  });
});

describe('errorMessage', () => {
  it('uses the message of Error instances', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

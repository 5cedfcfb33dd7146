import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  StoreError,
  CorpusReadError,
  SerializationError,
  ItemPersistenceError,
  IndexingCancelledError,
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
    const error = new AppError('StoreError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('UsageError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('error subclasses', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError', 'ConfigError'],
    [new UsageError('x'), 'UsageError', 'UsageError'],
    [new StoreError('x'), 'StoreError', 'StoreError'],
    [new CorpusReadError('x'), 'CorpusReadError', 'CorpusReadError'],
    [new SerializationError('x'), 'SerializationError', 'SerializationError'],
  ])('%s carries its code and name', (error, code, name) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('prefixes item failures with the message id', () => {
    const error = new ItemPersistenceError('m-7', 'disk full');
    expect(error.code).toBe('ItemPersistenceError');
    expect(error.messageId).toBe('m-7');
    expect(error.message).toBe('Message "m-7": disk full');
  });

  it('records how much work a cancelled run kept', () => {
    const error = new IndexingCancelledError(40);
    expect(error.code).toBe('IndexingCancelled');
    expect(error.processed).toBe(40);
    expect(error.message).toBe('Indexing cancelled after 40 messages');
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

import { describe, it, expect } from 'vitest';
import { AppError, EventSaveError } from '../../src/utils/errors';

describe('AppError', () => {
  it('should create an error with message, status code and code', () => {
    const error = new AppError('Test error', 422, 'VALIDATION_ERROR');

    expect(error.message).toBe('Test error');
    expect(error.statusCode).toBe(422);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.name).toBe('AppError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should leave code undefined when not given', () => {
    expect(new AppError('Test error', 400).code).toBeUndefined();
  });
});

describe('EventSaveError', () => {
  it('should create a 500 error with default message', () => {
    const error = new EventSaveError();

    expect(error.message).toBe('Error saving event');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('EVENT_SAVE_FAILED');
    expect(error.name).toBe('EventSaveError');
    expect(error).toBeInstanceOf(AppError);
  });
});

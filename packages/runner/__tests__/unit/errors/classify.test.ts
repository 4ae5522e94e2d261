import { describe, expect, test } from 'vitest';
import { classifyError, errorMessage } from '../../../src/errors/classify.js';
import {
  PortalBusinessError,
  PortalChangedError,
  TransientError,
  UnknownError,
  ValidationError,
} from '../../../src/errors/taxonomy.js';

describe('classifyError', () => {
  test('passes taxonomy errors through unchanged', () => {
    const errors = [
      new ValidationError('bad payload'),
      new PortalBusinessError('Member not found'),
      new PortalChangedError('submit', 'button missing'),
      new TransientError('slow'),
      new UnknownError('odd'),
    ];
    for (const err of errors) {
      expect(classifyError(err)).toBe(err);
    }
  });

  test('treats a closed browser as a dead session', () => {
    const classified = classifyError(new Error('Target page, context or browser has been closed'));
    expect(classified).toBeInstanceOf(TransientError);
    expect(classified instanceof TransientError && classified.sessionInvalid).toBe(true);
  });

  test('treats a login redirect message as a dead session', () => {
    const classified = classifyError(new Error('Session expired, please log in again'));
    expect(classified instanceof TransientError && classified.sessionInvalid).toBe(true);
  });

  test('treats timeouts and connection resets as transient', () => {
    for (const message of [
      'locator.click: Timeout 20000ms exceeded.',
      'read ECONNRESET',
      'page.goto: net::ERR_CONNECTION_REFUSED at https://portal.example.com',
    ]) {
      const classified = classifyError(new Error(message));
      expect(classified).toBeInstanceOf(TransientError);
      expect(classified instanceof TransientError && classified.sessionInvalid).toBe(false);
      expect(classified.message).toBe(message);
    }
  });

  test('anything else is unknown and keeps the cause', () => {
    const original = new TypeError("Cannot read properties of undefined (reading 'x')");
    const classified = classifyError(original);
    expect(classified).toBeInstanceOf(UnknownError);
    expect(classified.kind).toBe('UnknownError');
    expect(classified.cause).toBe(original);
  });

  test('non-error values are stringified', () => {
    const classified = classifyError('plain failure');
    expect(classified).toBeInstanceOf(UnknownError);
    expect(classified.message).toBe('plain failure');
  });
});

describe('error taxonomy', () => {
  test('names and kinds follow the class', () => {
    const err = new PortalChangedError('fill form', "field 'memberId' (#member-id) not found");
    expect(err.name).toBe('PortalChangedError');
    expect(err.kind).toBe('PortalChangedError');
    expect(err.message).toBe("fill form: field 'memberId' (#member-id) not found");
  });

  test('transient errors default to a healthy session', () => {
    expect(new TransientError('slow').sessionInvalid).toBe(false);
  });

  test('errorMessage reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

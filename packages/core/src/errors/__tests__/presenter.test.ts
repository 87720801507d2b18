import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../../errors/presenter.js';
import { ErrorCode } from '../../errors/codes.js';
import {
  CoercionError,
  ConfigError,
  UnknownFieldError,
} from '../../types/errors.js';

function unknownField(): UnknownFieldError {
  return new UnknownFieldError({
    field: 'nmae',
    targetType: 'Person',
    knownFields: ['name', 'email'],
    suggestions: ['name', 'email'],
  }).annotate({ key: 'nmae', path: 'nmae' });
}

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
    delete process.env.REQUEST_ID;
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('formatForAPI maps error code to HTTP status', () => {
    const presenter = new ErrorPresenter('prod', { requestId: 'req-1' });
    const api = presenter.formatForAPI(unknownField());

    expect(api).toEqual({
      status: 422,
      type: 'urn:formcodec:error:E100',
      title: 'unknown field "nmae" in record Person',
      detail: 'unknown field "nmae" in record Person at nmae',
      instance: 'req-1',
      code: ErrorCode.UNKNOWN_FIELD,
      key: 'nmae',
      path: 'nmae',
      suggestions: ['name', 'email'],
    });
  });

  test('formatForCLI builds title, location and suggestion', () => {
    const presenter = new ErrorPresenter('dev', { terminalWidth: 100 });
    const view = presenter.formatForCLI(unknownField());

    expect(view.title).toBe('Error E100: unknown field "nmae" in record Person');
    expect(view.location).toBe('Key: nmae');
    expect(view.suggestion).toBe('Did you mean "name"?');
    expect(view.details).toEqual([]);
    expect(view.colors).toBe(true);
    expect(view.terminalWidth).toBe(100);
  });

  test('formatForCLI lists configuration details', () => {
    const presenter = new ErrorPresenter('prod', { colors: false });
    const view = presenter.formatForCLI(
      new ConfigError({
        message: 'invalid descriptor document',
        errorCode: ErrorCode.INVALID_DESCRIPTOR_DOCUMENT,
        details: ['/ must have required property \'type\''],
      })
    );

    expect(view.location).toBeUndefined();
    expect(view.details).toEqual(["/ must have required property 'type'"]);
    expect(view.colors).toBe(false);
  });

  test('NO_COLOR disables colors even in dev', () => {
    process.env.NO_COLOR = '1';
    const view = new ErrorPresenter('dev').formatForCLI(unknownField());
    expect(view.colors).toBe(false);
  });

  test('production redacts values of sensitive keys', () => {
    const error = new CoercionError({
      message: 'cannot parse "abc" as int: invalid syntax',
      targetType: 'int',
      value: 'abc',
    }).annotate({ key: 'user[token]' });

    const prod = new ErrorPresenter('prod', { requestId: 'req-2' }).formatForProduction(error);

    expect(prod.context?.value).toBe('[REDACTED]');
    expect(prod.stack).toBeUndefined();
    expect(prod.requestId).toBe('req-2');
  });

  test('production applies presenter redactKeys on top', () => {
    const error = new CoercionError({
      message: 'cannot parse "abc" as int: invalid syntax',
      targetType: 'int',
      value: 'abc',
    }).annotate({ key: 'profile[pin]' });

    const plain = new ErrorPresenter('prod').formatForProduction(error);
    const redacted = new ErrorPresenter('prod', {
      redactKeys: ['pin'],
    }).formatForProduction(error);

    expect(plain.context?.value).toBe('abc');
    expect(redacted.context?.value).toBe('[REDACTED]');
  });
});

import { describe, expect, it } from 'vitest';

import { parseTag } from '../tags.js';

describe('parseTag', () => {
  it('leaves the name empty for an empty tag', () => {
    expect(parseTag('')).toEqual({ name: '', omitIfEmpty: false, ignore: false });
  });

  it('reads "-" as ignore', () => {
    expect(parseTag('-')).toEqual({ name: '', omitIfEmpty: false, ignore: true });
    expect(parseTag('  -  ')).toEqual({
      name: '',
      omitIfEmpty: false,
      ignore: true,
    });
  });

  it('reads a name with flags', () => {
    expect(parseTag('email,omitempty')).toEqual({
      name: 'email',
      omitIfEmpty: true,
      ignore: false,
    });
    expect(parseTag('token, ignore')).toEqual({
      name: 'token',
      omitIfEmpty: false,
      ignore: true,
    });
  });

  it('keeps flags when the name is omitted', () => {
    expect(parseTag(',omitempty')).toEqual({
      name: '',
      omitIfEmpty: true,
      ignore: false,
    });
  });

  it('treats "-" followed by flags as ignore', () => {
    expect(parseTag('-,omitempty')).toEqual({
      name: '',
      omitIfEmpty: true,
      ignore: true,
    });
  });

  it('skips unknown flags', () => {
    expect(parseTag('id,string,omitempty')).toEqual({
      name: 'id',
      omitIfEmpty: true,
      ignore: false,
    });
  });
});

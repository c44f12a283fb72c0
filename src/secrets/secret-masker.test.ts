import { describe, expect, it } from 'vitest';

import { maskSecretBundle, maskSecretValue } from './secret-masker.js';

describe('maskSecretValue', () => {
  it('keeps the first and last four characters of long values', () => {
    expect(maskSecretValue('ZCt8Q~C5KDbL2l25WFfwKh')).toBe('ZCt8****fwKh');
    expect(maskSecretValue('xoxb-12345')).toBe('xoxb****2345');
  });

  it('fully masks values of eight characters or fewer', () => {
    expect(maskSecretValue('secret')).toBe('****');
    expect(maskSecretValue('12345678')).toBe('****');
    expect(maskSecretValue('a')).toBe('****');
  });

  it('partially masks a nine character value', () => {
    expect(maskSecretValue('123456789')).toBe('1234****6789');
  });

  it('counts code points rather than UTF-16 units', () => {
    expect(maskSecretValue('🔑🔑🔑🔑🔒🔒🔒🔒')).toBe('****');
    expect(maskSecretValue('🔑🔑🔑🔑x🔒🔒🔒🔒')).toBe('🔑🔑🔑🔑****🔒🔒🔒🔒');
    expect(maskSecretValue('ab🔑cd-secret-ef🔒')).toBe('ab🔑c****-ef🔒');
  });

  it('is stable when applied to its own output', () => {
    const once = maskSecretValue('xoxb-12345');
    expect(maskSecretValue(once)).toBe('xoxb****2345');
  });
});

describe('maskSecretBundle', () => {
  it('masks every field', () => {
    expect(
      maskSecretBundle({
        signingSecret: 'xoxb-12345',
        webhookSecret: 'abcdefghijklmnopqrstuvwxyz012345',
        appPassword: 'short',
      }),
    ).toEqual({
      signingSecret: 'xoxb****2345',
      webhookSecret: 'abcd****2345',
      appPassword: '****',
    });
  });

  it('drops empty values', () => {
    expect(maskSecretBundle({ botToken: '', signingSecret: 'xoxb-12345' })).toEqual({
      signingSecret: 'xoxb****2345',
    });
  });

  it('does not modify the input', () => {
    const bundle = { signingSecret: 'xoxb-12345' };
    maskSecretBundle(bundle);
    expect(bundle).toEqual({ signingSecret: 'xoxb-12345' });
  });
});

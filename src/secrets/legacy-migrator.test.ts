import { describe, expect, it } from 'vitest';

import { ValidationError } from '@/core/errors.js';

import { extractLegacySecrets, hasLegacySecrets } from './legacy-migrator.js';

describe('extractLegacySecrets', () => {
  it('moves slack credentials out of the configuration', () => {
    const result = extractLegacySecrets('slack', {
      signingSecret: 'test-signing',
      botToken: 'xoxb-test',
      incomingWebhookUrl: 'https://hooks.example.com/T000/B000',
      teamId: 'T000',
    });

    expect(result).toEqual({
      secrets: {
        signingSecret: 'test-signing',
        botToken: 'xoxb-test',
        incomingWebhookUrl: 'https://hooks.example.com/T000/B000',
      },
      configuration: { teamId: 'T000' },
    });
  });

  it.each([
    ['msteams', 'appPassword'],
    ['teams', 'appPassword'],
    ['outlook', 'clientSecret'],
    ['webhook', 'secret'],
    ['generic', 'secret'],
  ])('extracts the %s secret field %s', (platform, field) => {
    const result = extractLegacySecrets(platform, { [field]: 'test-secret', other: 'kept' });

    expect(result.secrets).toEqual({ [field]: 'test-secret' });
    expect(result.configuration).toEqual({ other: 'kept' });
  });

  it('leaves fields that belong to other platforms in place', () => {
    const result = extractLegacySecrets('outlook', { appPassword: 'test-secret' });

    expect(result.secrets).toEqual({});
    expect(result.configuration).toEqual({ appPassword: 'test-secret' });
  });

  it('is a no-op on already-migrated configuration', () => {
    const first = extractLegacySecrets('slack', { signingSecret: 'test-signing', teamId: 'T1' });
    const second = extractLegacySecrets('slack', first.configuration);

    expect(second.secrets).toEqual({});
    expect(second.configuration).toEqual({ teamId: 'T1' });
  });

  it('produces the same bundle when run twice on the same input', () => {
    const input = { signingSecret: 'test-signing', botToken: 'xoxb-test' };
    expect(extractLegacySecrets('slack', input)).toEqual(extractLegacySecrets('slack', input));
  });

  it('does not mutate the input', () => {
    const input = { signingSecret: 'test-signing', teamId: 'T1' };
    extractLegacySecrets('slack', input);
    expect(input).toEqual({ signingSecret: 'test-signing', teamId: 'T1' });
  });

  it('drops empty and null secret values from both outputs', () => {
    const result = extractLegacySecrets('slack', { signingSecret: '', botToken: null });

    expect(result).toEqual({ secrets: {}, configuration: {} });
  });

  it('rejects an unsupported platform', () => {
    expect(() => extractLegacySecrets('discord', {})).toThrow(ValidationError);
    expect(() => extractLegacySecrets('discord', {})).toThrow('Unsupported platform: discord');
  });

  it('rejects a non-string secret value', () => {
    expect(() => extractLegacySecrets('slack', { signingSecret: 42 })).toThrow(
      'Secret field "signingSecret" must be a string',
    );
  });
});

describe('hasLegacySecrets', () => {
  it('detects secret fields still in the configuration', () => {
    expect(hasLegacySecrets('slack', { botToken: 'xoxb-test' })).toBe(true);
    expect(hasLegacySecrets('slack', { teamId: 'T1' })).toBe(false);
  });
});

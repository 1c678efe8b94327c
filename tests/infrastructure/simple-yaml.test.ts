import { describe, it, expect } from 'vitest';
import { parseSimpleYaml } from '../../src/infrastructure/config/simple-yaml.js';

describe('parseSimpleYaml', () => {
  it('parses sections with scalar values', () => {
    const parsed = parseSimpleYaml([
      '# comment',
      'slack:',
      '  enabled: true',
      '  webhook_url: "https://hooks.example.test/x"',
      '',
      'notifications:',
      "  min_severity: 'critical'",
    ].join('\n'));

    expect(parsed).toEqual({
      slack: { enabled: true, webhook_url: 'https://hooks.example.test/x' },
      notifications: { min_severity: 'critical' },
    });
  });

  it('keeps colons inside values', () => {
    const parsed = parseSimpleYaml('pipeline:\n  feed_url: https://feed.example.test:8443/a\n');
    expect(parsed['pipeline']?.['feed_url']).toBe('https://feed.example.test:8443/a');
  });

  it('parses inline and block lists', () => {
    const parsed = parseSimpleYaml([
      'contacts:',
      '  inline: [a@example.com, "b@example.com"]',
      '  empty: []',
      '  recipients:',
      '    - ops@example.com',
      "    - 'oncall@example.com'",
      '  enabled: false',
    ].join('\n'));

    expect(parsed['contacts']).toEqual({
      inline: ['a@example.com', 'b@example.com'],
      empty: [],
      recipients: ['ops@example.com', 'oncall@example.com'],
      enabled: false,
    });
  });

  it('returns an empty object for empty input', () => {
    expect(parseSimpleYaml('')).toEqual({});
  });
});

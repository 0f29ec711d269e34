import { afterEach, describe, expect, it, vi } from 'vitest';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    vi.resetModules();
  });

  it('collapses error messages to a single line', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { ConfigurationError, ConflictError, ResolutionError, RestorationError, DomainLockedError } =
      await import('../src/errors/errors.js');

    expect(new ConfigurationError('ReportEntry', 'blank key').message).toBe('blank key');
    expect(new ConflictError('environment', 'FOO', []).message).toBe(
      "Key 'FOO' in domain 'environment' is targeted more than once."
    );
    expect(new ResolutionError('zip', ['city']).message).toBe("Could not resolve parameter named 'zip'.");
    expect(new RestorationError([new Error('one')]).message).toBe('1 restoration error(s) occurred.');
    expect(new DomainLockedError('environment').message).toBe("State domain 'environment' is locked.");
  });
});

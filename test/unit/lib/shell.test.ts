/**
 * Tests for shell quoting and name validation
 */
import { describe, it, expect } from '@jest/globals';
import { bashCommand, requireKubernetesName, shellQuote, validateKubernetesName } from '@/lib/shell';
import { InvalidNameError } from '@/lib/errors';

describe('shellQuote', () => {
  it('should leave safe words unquoted', () => {
    expect(shellQuote('supabase')).toBe('supabase');
    expect(shellQuote('/command-files/values.yaml')).toBe('/command-files/values.yaml');
  });

  it('should quote spaces and metacharacters', () => {
    expect(shellQuote('a b')).toBe("'a b'");
    expect(shellQuote('$(rm -rf /)')).toBe("'$(rm -rf /)'");
    expect(shellQuote('')).toBe("''");
  });

  it('should escape embedded single quotes', () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('bashCommand', () => {
  it('should wrap the script for a login shell', () => {
    expect(bashCommand('helm repo update && helm list')).toBe("bash -lc 'helm repo update && helm list'");
  });
});

describe('validateKubernetesName', () => {
  it('should accept DNS-1123 labels', () => {
    expect(validateKubernetesName('namespace', 'supabase-prod')).toEqual({ ok: true, value: 'supabase-prod' });
  });

  it('should reject uppercase, underscores and edge hyphens', () => {
    for (const name of ['Supabase', 'supa_base', '-supabase', 'supabase-', '']) {
      expect(validateKubernetesName('namespace', name).ok).toBe(false);
    }
  });

  it('should reject names longer than 63 characters', () => {
    const result = validateKubernetesName('release', 'a'.repeat(64));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(`release too long: "${'a'.repeat(64)}". Must be 63 characters or less.`);
    }
  });
});

describe('requireKubernetesName', () => {
  it('should throw InvalidNameError with the validation hint', () => {
    let caught: unknown;
    try {
      requireKubernetesName('namespace', 'Bad');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidNameError);
    expect(caught).toHaveProperty(
      'message',
      'Invalid namespace: "Bad". Must contain only lowercase letters, numbers, and hyphens.',
    );
  });
});

import { describe, expect, it } from 'vitest';
import { readBasicCredential } from '../auth';

describe('readBasicCredential', () => {
  it('decodes the whole credential, colons included', () => {
    expect(readBasicCredential(`Basic ${btoa('ci:test-secret')}`)).toBe(
      'ci:test-secret'
    );
    expect(readBasicCredential(`basic ${btoa('sharedtoken')}`)).toBe(
      'sharedtoken'
    );
  });

  it('decodes UTF-8 credentials', () => {
    // "jörg:pw" as UTF-8 bytes
    expect(readBasicCredential('Basic asO2cmc6cHc=')).toBe('jörg:pw');
  });

  it.each([
    [undefined],
    [''],
    ['Bearer dG9rZW4='],
    ['Basic ***'],
  ])('returns null for %s', (header) => {
    expect(readBasicCredential(header)).toBeNull();
  });
});

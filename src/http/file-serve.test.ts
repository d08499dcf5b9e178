import { describe, it, expect } from 'vitest';
import { fileNameFromPath } from './file-serve.js';

describe('fileNameFromPath', () => {
  it('decodes the name after the prefix', () => {
    expect(fileNameFromPath('/files/0190c3e2.png', '/files/')).toBe('0190c3e2.png');
    expect(fileNameFromPath('/files/my%20cat.png', '/files/')).toBe('my cat.png');
  });

  it('returns null for a malformed escape instead of throwing', () => {
    expect(fileNameFromPath('/files/%E0%A4%A', '/files/')).toBeNull();
  });

  it('returns null outside the prefix', () => {
    expect(fileNameFromPath('/other/a.png', '/files/')).toBeNull();
  });
});

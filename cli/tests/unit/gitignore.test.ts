import { describe, it, expect } from 'vitest';
import { missingEntries, renderGitignore } from '../../src/utils/gitignore';

describe('gitignore', () => {
  it('creates the section for a missing file', () => {
    expect(renderGitignore(null)).toBe('# pushgate - local state\n.pushgate/logs/\n.pushgate/*.backup.*\n');
  });

  it('appends after existing content that lacks a final newline', () => {
    expect(renderGitignore('node_modules')).toBe(
      'node_modules\n\n# pushgate - local state\n.pushgate/logs/\n.pushgate/*.backup.*\n',
    );
  });

  it('adds only what is missing', () => {
    expect(missingEntries('.pushgate/logs/\r\n')).toEqual(['.pushgate/*.backup.*']);
    expect(renderGitignore('.pushgate/logs/\n')).toBe('.pushgate/logs/\n\n# pushgate - local state\n.pushgate/*.backup.*\n');
  });

  it('leaves a file that already ignores the whole directory alone', () => {
    expect(renderGitignore('dist/\n.pushgate/\n')).toBeNull();
    expect(renderGitignore('.pushgate\n')).toBeNull();
  });
});

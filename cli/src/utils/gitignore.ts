/**
 * .gitignore management: keeps pushgate's local state out of commits.
 */

const GITIGNORE_HEADER = '# pushgate - local state';

export const REQUIRED_ENTRIES = ['.pushgate/logs/', '.pushgate/*.backup.*'];

function isCovered(lines: readonly string[], entry: string): boolean {
  return lines.includes(entry) || lines.includes('.pushgate/') || lines.includes('.pushgate');
}

export function missingEntries(content: string | null): string[] {
  if (content === null) {
    return [...REQUIRED_ENTRIES];
  }
  const lines = content.split(/\r?\n/).map((line) => line.trim());
  return REQUIRED_ENTRIES.filter((entry) => !isCovered(lines, entry));
}

/**
 * Returns `.gitignore` content with the missing entries appended, or null
 * when nothing needs to change.
 */
export function renderGitignore(content: string | null): string | null {
  const missing = missingEntries(content);
  if (missing.length === 0) {
    return null;
  }

  let updated = content ?? '';
  if (updated.length > 0 && !updated.endsWith('\n')) {
    updated += '\n';
  }
  const section = [GITIGNORE_HEADER, ...missing];
  if (updated.length > 0) {
    section.unshift('');
  }
  return `${updated}${section.join('\n')}\n`;
}

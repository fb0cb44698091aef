import fs from 'fs';
import { OperationalError, describeError } from '../utils/errors';

export interface AllowlistRule {
  source: string;
  regex: RegExp;
  lineNumber: number;
}

/** One regex per line; blank lines and `#` comments are ignored. */
export function parseAllowlist(contents: string, file: string): AllowlistRule[] {
  const rules: AllowlistRule[] = [];
  contents.split(/\r?\n/).forEach((raw, index) => {
    const source = raw.trim();
    if (!source || source.startsWith('#')) {
      return;
    }
    try {
      rules.push({ source, regex: new RegExp(source), lineNumber: index + 1 });
    } catch (error: unknown) {
      throw new OperationalError(`${file}:${index + 1}: invalid allowlist pattern: ${describeError(error)}`);
    }
  });
  return rules;
}

export async function loadAllowlist(filePath: string): Promise<AllowlistRule[]> {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  let contents: string;
  try {
    contents = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new OperationalError(`Cannot read allowlist ${filePath}: ${describeError(error)}`);
  }
  return parseAllowlist(contents, filePath);
}

export function findAllowlistRule(line: string, rules: readonly AllowlistRule[]): AllowlistRule | undefined {
  return rules.find((rule) => rule.regex.test(line));
}

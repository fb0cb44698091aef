import fs from 'fs';
import path from 'path';

const UNKNOWN_VERSION = '0.0.0';

let cachedVersion: string | undefined;

function readVersionField(manifest: unknown): string | undefined {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return undefined;
}

/** Version from the package manifest next to `src/` or `dist/`; stamped into installed hooks. */
export function getCliVersion(): string {
  if (cachedVersion === undefined) {
    try {
      const manifest: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf-8'));
      cachedVersion = readVersionField(manifest) ?? UNKNOWN_VERSION;
    } catch {
      // running from an unpacked copy without package.json
      cachedVersion = UNKNOWN_VERSION;
    }
  }
  return cachedVersion;
}

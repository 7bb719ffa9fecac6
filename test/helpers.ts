import fs from 'fs';
import os from 'os';
import path from 'path';
import type { LineWriter, ProviderCredentials } from '../src/types/plays';
import { createLogger } from '../src/utils/logger';

export const quietLogger = createLogger({ level: 'error', silent: true });

export function collectLines(): { lines: string[]; write: LineWriter } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

export function credentials(overrides: Partial<ProviderCredentials> = {}): () => ProviderCredentials {
  return () => ({
    soundcloud: overrides.soundcloud ?? {},
    youtube: overrides.youtube ?? {},
  });
}

export function writeTempList(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'set-plays-'));
  const file = path.join(dir, 'all-sets.md');
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

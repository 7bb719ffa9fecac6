import fs from 'fs';
import type { SetEntry } from '../types/plays';
import { SetListReadError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';

const LIST_MARKER = '* ';
const LINKED_ITEM = /\* \[(.*?)\]\((.*?)\)/;

export function dedupKey(entry: SetEntry): string {
  return entry.link ? entry.link : entry.rawLine;
}

export function isListItem(trimmed: string): boolean {
  return trimmed.startsWith(LIST_MARKER);
}

/**
 * Turns a markdown document into the ordered, de-duplicated list of set entries.
 * Lines that are not `* ` list items are ignored; list items without a
 * `[name](url)` link are kept as raw, unlinked entries.
 */
export function parseSetList(content: string, logger?: AppLogger): SetEntry[] {
  const entries: SetEntry[] = [];
  const seen = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!isListItem(trimmed)) continue;

    const match = LINKED_ITEM.exec(trimmed);
    const entry: SetEntry = match
      ? { name: match[1] ?? '', ...(match[2] ? { link: match[2] } : {}), rawLine: trimmed }
      : { name: trimmed, rawLine: trimmed };

    const key = dedupKey(entry);
    if (seen.has(key)) {
      logger?.debug('set_duplicate_skipped', { key });
      continue;
    }
    seen.add(key);

    if (entry.link) {
      logger?.debug('set_found_linked', { name: entry.name, link: entry.link });
    } else {
      logger?.debug('set_found_unlinked', { line: trimmed });
    }
    entries.push(entry);
  }

  logger?.debug('set_list_parsed', { uniqueSets: entries.length });
  return entries;
}

export async function readSetListFile(path: string): Promise<string> {
  try {
    return await fs.promises.readFile(path, 'utf8');
  } catch (error) {
    throw new SetListReadError(path, error);
  }
}

export async function readSetList(path: string, logger?: AppLogger): Promise<SetEntry[]> {
  logger?.debug('set_list_opening', { path });
  const content = await readSetListFile(path);
  return parseSetList(content, logger);
}

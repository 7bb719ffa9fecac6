import type { LineWriter } from '../types/plays';
import { parsePlaysAnnotation } from '../utils/format';
import type { AppLogger } from '../utils/logger';
import { isListItem, readSetListFile } from './SetListParser';

interface AnnotatedLine {
  line: string;
  plays: number;
}

const MARKDOWN_LINK = /\((https?:\/\/[^\s)]+)\)/;

/**
 * Re-orders an annotated list by play count, highest first. Lines sharing a
 * link collapse to the first one; lines without a link are always kept.
 */
export function sortSetLines(content: string): string[] {
  const entries: AnnotatedLine[] = [];
  const seenLinks = new Set<string>();

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!isListItem(line)) continue;

    const link = MARKDOWN_LINK.exec(line)?.[1];
    if (link) {
      if (seenLinks.has(link)) continue;
      seenLinks.add(link);
    }
    entries.push({ line, plays: parsePlaysAnnotation(line) });
  }

  // Array.prototype.sort is stable, so equal counts keep their source order
  return entries.sort((a, b) => b.plays - a.plays).map((e) => e.line);
}

export class SetSorter {
  constructor(private readonly logger: AppLogger) {}

  async printSorted(path: string, emit: LineWriter): Promise<number> {
    const content = await readSetListFile(path);
    const lines = sortSetLines(content);
    this.logger.debug('sorted_sets', { path, lines: lines.length });
    lines.forEach((line) => emit(line));
    return lines.length;
  }
}

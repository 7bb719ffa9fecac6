import type { ProviderId, ProviderLinks } from '../types/plays';

// Each pattern runs up to the first double quote of the surrounding attribute or JSON string
const LINK_PATTERNS: Record<ProviderId, RegExp> = {
  mixcloud: /https:\/\/www\.mixcloud\.com\/[^"]+/,
  soundcloud: /https:\/\/soundcloud\.com\/[^"]+/,
  youtube: /https:\/\/(?:www\.)?youtube\.com\/[^"]+|https:\/\/youtu\.be\/[^"]+/,
};

function firstMatch(page: string, pattern: RegExp): string | undefined {
  const m = pattern.exec(page);
  return m ? m[0] : undefined;
}

export function findMixcloudLink(page: string): string | undefined {
  return firstMatch(page, LINK_PATTERNS.mixcloud);
}

export function findSoundCloudLink(page: string): string | undefined {
  return firstMatch(page, LINK_PATTERNS.soundcloud);
}

export function findYouTubeLink(page: string): string | undefined {
  return firstMatch(page, LINK_PATTERNS.youtube);
}

export function findProviderLinks(page: string): ProviderLinks {
  const links: ProviderLinks = {};
  const mixcloud = findMixcloudLink(page);
  const soundcloud = findSoundCloudLink(page);
  const youtube = findYouTubeLink(page);
  if (mixcloud) links.mixcloud = mixcloud;
  if (soundcloud) links.soundcloud = soundcloud;
  if (youtube) links.youtube = youtube;
  return links;
}

const MIXCLOUD_SHOW = /https:\/\/www\.mixcloud\.com\/([^/]+)\/([^/?#]+)\/?/;
const YOUTUBE_WATCH = /youtube\.com\/(?:watch\?v=|live\/)([a-zA-Z0-9_-]+)/;
const YOUTUBE_SHORT = /youtu\.be\/([a-zA-Z0-9_-]+)/;

export function parseMixcloudShow(url: string): { username: string; slug: string } | null {
  const m = MIXCLOUD_SHOW.exec(url);
  if (!m || !m[1] || !m[2]) return null;
  return { username: m[1], slug: m[2] };
}

export function extractYouTubeVideoId(url: string): string | null {
  for (const pattern of [YOUTUBE_WATCH, YOUTUBE_SHORT]) {
    const m = pattern.exec(url);
    if (m && m[1]) return m[1];
  }
  return null;
}

import { describe, it, expect } from 'vitest';
import {
  extractYouTubeVideoId,
  findMixcloudLink,
  findProviderLinks,
  findSoundCloudLink,
  findYouTubeLink,
  parseMixcloudShow,
} from '../../src/utils/providers';

const SET_PAGE = `
<html><body>
  <iframe src="https://www.mixcloud.com/widget/iframe/?feed=%2Fdj%2Fsunset%2F"></iframe>
  <a href="https://www.mixcloud.com/dj/sunset/">Mixcloud</a>
  <a href="https://soundcloud.com/dj/sunset-mix">SoundCloud</a>
  <a href="https://soundcloud.com/dj/other">Other</a>
  <a href="https://youtu.be/abc_123-X">YouTube</a>
</body></html>`;

describe('provider link detection', () => {
  it('keeps the first match per provider and stops at the quote', () => {
    expect(findProviderLinks(SET_PAGE)).toEqual({
      mixcloud: 'https://www.mixcloud.com/widget/iframe/?feed=%2Fdj%2Fsunset%2F',
      soundcloud: 'https://soundcloud.com/dj/sunset-mix',
      youtube: 'https://youtu.be/abc_123-X',
    });
  });

  it('treats missing providers as not hosted', () => {
    const page = '<a href="https://soundcloud.com/dj/only">x</a>';
    expect(findProviderLinks(page)).toEqual({ soundcloud: 'https://soundcloud.com/dj/only' });
    expect(findMixcloudLink(page)).toBeUndefined();
    expect(findYouTubeLink(page)).toBeUndefined();
  });

  it('recognises both YouTube host shapes', () => {
    expect(findYouTubeLink('"https://www.youtube.com/watch?v=abc123"')).toBe('https://www.youtube.com/watch?v=abc123');
    expect(findYouTubeLink('"https://youtube.com/live/xyz"')).toBe('https://youtube.com/live/xyz');
  });

  it('returns an empty result for pages without provider links', () => {
    expect(findProviderLinks('<p>nothing here</p>')).toEqual({});
    expect(findSoundCloudLink('')).toBeUndefined();
  });
});

describe('parseMixcloudShow', () => {
  it('captures username and slug', () => {
    expect(parseMixcloudShow('https://www.mixcloud.com/dj/sunset-session/')).toEqual({ username: 'dj', slug: 'sunset-session' });
    expect(parseMixcloudShow('https://www.mixcloud.com/dj/sunset?utm=1')).toEqual({ username: 'dj', slug: 'sunset' });
  });

  it('returns null when a segment is missing', () => {
    expect(parseMixcloudShow('https://www.mixcloud.com/dj')).toBeNull();
  });
});

describe('extractYouTubeVideoId', () => {
  it('reads watch, live and short links', () => {
    expect(extractYouTubeVideoId('https://www.youtube.com/watch?v=abc123&t=10')).toBe('abc123');
    expect(extractYouTubeVideoId('https://www.youtube.com/live/Live_01')).toBe('Live_01');
    expect(extractYouTubeVideoId('https://youtu.be/short-1?si=x')).toBe('short-1');
  });

  it('returns null for other URL shapes', () => {
    expect(extractYouTubeVideoId('https://www.youtube.com/@channel')).toBeNull();
  });
});

import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { SoundCloudCredentials } from '../../types/plays';
import type { AppLogger } from '../../utils/logger';

export const SOUNDCLOUD_RESOLVE_URL = 'https://api.soundcloud.com/resolve';
export const SOUNDCLOUD_TOKEN_URL = 'https://api.soundcloud.com/oauth2/token';

export type SoundCloudStrategyKind = 'token' | 'client-credentials' | 'legacy' | 'html-scrape';

export interface StrategyResult {
  count: number;
  succeeded: boolean;
}

export interface SoundCloudStrategy {
  readonly kind: SoundCloudStrategyKind;
  isAvailable(credentials: SoundCloudCredentials): boolean;
  resolve(url: string, credentials: SoundCloudCredentials): Promise<StrategyResult>;
}

const FAILED: StrategyResult = { count: 0, succeeded: false };

const TrackSchema = z.object({
  id: z.number().optional(),
  playback_count: z.number().int().nonnegative().nullish(),
});

const TokenSchema = z.object({
  access_token: z.string().optional(),
});

// A track object without playback_count still counts as a successful lookup
function decodeTrack(data: unknown): StrategyResult {
  const parsed = TrackSchema.safeParse(data);
  if (!parsed.success) return FAILED;
  return { count: parsed.data.playback_count ?? 0, succeeded: true };
}

function locationOf(response: AxiosResponse): string | undefined {
  const location: unknown = response.headers['location'];
  return typeof location === 'string' && location !== '' ? location : undefined;
}

async function resolveWithToken(
  http: AxiosInstance,
  logger: AppLogger,
  url: string,
  token: string
): Promise<StrategyResult> {
  const headers = { Authorization: `OAuth ${token}` };
  const response = await http.get(SOUNDCLOUD_RESOLVE_URL, {
    params: { url },
    headers,
    maxRedirects: 0,
    validateStatus: () => true,
  });

  if (response.status === 200) {
    return decodeTrack(response.data);
  }

  if (response.status === 302) {
    const location = locationOf(response);
    if (!location) return FAILED;
    logger.debug('soundcloud_token_resolve_redirected', { location });
    const redirected = await http.get(location, { headers, validateStatus: () => true });
    if (redirected.status === 200) {
      return decodeTrack(redirected.data);
    }
    logger.debug('soundcloud_token_redirect_status', { status: redirected.status });
    return FAILED;
  }

  logger.debug('soundcloud_token_resolve_status', { status: response.status });
  return FAILED;
}

export class TokenResolver implements SoundCloudStrategy {
  readonly kind = 'token' as const;

  constructor(private readonly http: AxiosInstance, private readonly logger: AppLogger) {}

  isAvailable(credentials: SoundCloudCredentials): boolean {
    return !!credentials.oauthToken;
  }

  async resolve(url: string, credentials: SoundCloudCredentials): Promise<StrategyResult> {
    if (!credentials.oauthToken) return FAILED;
    return resolveWithToken(this.http, this.logger, url, credentials.oauthToken);
  }
}

export class ClientCredentialResolver implements SoundCloudStrategy {
  readonly kind = 'client-credentials' as const;

  constructor(private readonly http: AxiosInstance, private readonly logger: AppLogger) {}

  isAvailable(credentials: SoundCloudCredentials): boolean {
    return !!credentials.clientId && !!credentials.clientSecret;
  }

  async resolve(url: string, credentials: SoundCloudCredentials): Promise<StrategyResult> {
    const { clientId, clientSecret } = credentials;
    if (!clientId || !clientSecret) return FAILED;

    const response = await this.http.post(
      SOUNDCLOUD_TOKEN_URL,
      new URLSearchParams({
        client_id: clientId,
        client_secret: clientSecret,
        grant_type: 'client_credentials',
      }),
      {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        validateStatus: () => true,
      }
    );
    if (response.status !== 200) {
      this.logger.debug('soundcloud_token_exchange_status', { status: response.status });
      return FAILED;
    }

    const parsed = TokenSchema.safeParse(response.data);
    const accessToken = parsed.success ? parsed.data.access_token : undefined;
    if (!accessToken) {
      this.logger.debug('soundcloud_token_exchange_empty');
      return FAILED;
    }

    this.logger.debug('soundcloud_token_obtained');
    return resolveWithToken(this.http, this.logger, url, accessToken);
  }
}

export class LegacyResolver implements SoundCloudStrategy {
  readonly kind = 'legacy' as const;

  constructor(private readonly http: AxiosInstance, private readonly logger: AppLogger) {}

  isAvailable(credentials: SoundCloudCredentials): boolean {
    return !!credentials.clientId;
  }

  async resolve(url: string, credentials: SoundCloudCredentials): Promise<StrategyResult> {
    const clientId = credentials.clientId;
    if (!clientId) return FAILED;

    const response = await this.http.get(SOUNDCLOUD_RESOLVE_URL, {
      params: { url, client_id: clientId },
      maxRedirects: 0,
      validateStatus: () => true,
    });

    if (response.status === 200) {
      const result = decodeTrack(response.data);
      if (result.succeeded) return result;
    }

    if (response.status === 302) {
      const location = locationOf(response);
      if (location) {
        this.logger.debug('soundcloud_legacy_resolve_redirected', { location });
        const redirected = await this.http.get(`${location}?client_id=${clientId}`, {
          validateStatus: () => true,
        });
        const result = decodeTrack(redirected.data);
        if (result.succeeded) return result;
      }
    }

    if (response.status === 401) {
      this.logger.warning('soundcloud_client_id_rejected', { status: 401 });
    } else {
      this.logger.debug('soundcloud_legacy_resolve_status', { status: response.status });
    }
    return FAILED;
  }
}

const PLAYBACK_COUNT_PATTERNS = [/"playback_count"\s*:\s*([0-9]+)/, /playback_count\s*:\s*([0-9]+)/];

export function scrapePlaybackCount(html: string): number | undefined {
  for (const pattern of PLAYBACK_COUNT_PATTERNS) {
    const m = pattern.exec(html);
    if (m && m[1]) return Number(m[1]);
  }
  return undefined;
}

export class HtmlScrapeResolver implements SoundCloudStrategy {
  readonly kind = 'html-scrape' as const;

  constructor(private readonly http: AxiosInstance, private readonly logger: AppLogger) {}

  isAvailable(): boolean {
    return true;
  }

  async resolve(url: string): Promise<StrategyResult> {
    const response = await this.http.get<string>(url, {
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    });
    const html = typeof response.data === 'string' ? response.data : '';
    const count = scrapePlaybackCount(html);
    if (count === undefined) {
      this.logger.debug('soundcloud_html_no_playback_count', { url, bytes: html.length });
      return FAILED;
    }
    return { count, succeeded: true };
  }
}

export function createSoundCloudStrategies(http: AxiosInstance, logger: AppLogger): SoundCloudStrategy[] {
  return [
    new TokenResolver(http, logger),
    new ClientCredentialResolver(http, logger),
    new LegacyResolver(http, logger),
    new HtmlScrapeResolver(http, logger),
  ];
}

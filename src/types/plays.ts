export interface SetEntry {
  readonly name: string;
  // Absent for sets that are not published yet
  readonly link?: string;
  // Trimmed source line, echoed verbatim for unlinked entries
  readonly rawLine: string;
}

export type ProviderId = 'mixcloud' | 'soundcloud' | 'youtube';

export type ProviderLinks = Partial<Record<ProviderId, string>>;

export interface AggregationSummary {
  totalPlays: number;
  totalSets: number;
}

export type LineWriter = (line: string) => void;

export interface LoggingConfig {
  level: string;
  file?: string;
  silent?: boolean;
}

export interface PlaysConfig {
  setsFile: string;
  userAgent: string;
  logging: LoggingConfig;
}

export interface SoundCloudCredentials {
  oauthToken?: string;
  clientId?: string;
  clientSecret?: string;
}

export interface ProviderCredentials {
  soundcloud: SoundCloudCredentials;
  youtube: {
    apiKey?: string;
  };
}

export type CredentialSource = () => ProviderCredentials;

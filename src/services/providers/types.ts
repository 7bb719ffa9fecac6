import type { ProviderId } from '../../types/plays';

export interface PlayCountProvider {
  readonly id: ProviderId;
  /** Never rejects: any failure resolves to 0. */
  getPlays(url: string): Promise<number>;
}

export type PlayCountProviders = Record<ProviderId, PlayCountProvider>;

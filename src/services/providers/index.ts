import type { AxiosInstance } from 'axios';
import type { CredentialSource } from '../../types/plays';
import type { AppLogger } from '../../utils/logger';
import { MixcloudPlaysProvider } from './MixcloudPlaysProvider';
import { SoundCloudPlaysProvider } from './SoundCloudPlaysProvider';
import { YouTubePlaysProvider } from './YouTubePlaysProvider';
import type { PlayCountProviders } from './types';

export function createPlayCountProviders(
  http: AxiosInstance,
  logger: AppLogger,
  credentials: CredentialSource
): PlayCountProviders {
  return {
    mixcloud: new MixcloudPlaysProvider(http, logger),
    soundcloud: new SoundCloudPlaysProvider(http, logger, credentials),
    youtube: new YouTubePlaysProvider(http, logger, credentials),
  };
}

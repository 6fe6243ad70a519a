import { ConfigService } from '@nestjs/config';

export interface KeygenSettings {
  resultTtlSeconds: number;
  visibilityTimeoutSeconds: number;
  maxReceiveCount: number;
}

export const KEYGEN_DEFAULTS: KeygenSettings = {
  resultTtlSeconds: 3600,
  visibilityTimeoutSeconds: 120,
  maxReceiveCount: 5,
};

export function readKeygenSettings(config: ConfigService): KeygenSettings {
  return {
    resultTtlSeconds: Number(config.get('RESULT_TTL_SECONDS', KEYGEN_DEFAULTS.resultTtlSeconds)),
    visibilityTimeoutSeconds: Number(
      config.get('QUEUE_VISIBILITY_TIMEOUT_SECONDS', KEYGEN_DEFAULTS.visibilityTimeoutSeconds),
    ),
    maxReceiveCount: Number(config.get('QUEUE_MAX_RECEIVE_COUNT', KEYGEN_DEFAULTS.maxReceiveCount)),
  };
}

import type { ConfigService } from '@nestjs/config';
import type { EngineConfig } from '../auction/engine';
import type { EngineSettings } from './configuration';

/**
 * Maps the `engine` config section onto the engine's construction struct.
 * Range checks stay in the engine.
 */
export function buildEngineConfig(config: ConfigService): EngineConfig {
  const settings = config.getOrThrow<EngineSettings>('engine');
  return {
    roles: {
      admin: settings.admin ?? '',
      auctioneers: settings.auctioneers,
      operators: settings.operators,
      maintainers: settings.maintainers,
      recovery: settings.recovery,
    },
    platformFeePercentage: settings.platformFeePercentage,
    maxFeePercentage: settings.maxFeePercentage,
    rateLimitPeriodSeconds: settings.rateLimitPeriodSeconds,
    maxActionsPerPeriod: settings.maxActionsPerPeriod,
    actionCooldownSeconds: settings.actionCooldownSeconds,
  };
}

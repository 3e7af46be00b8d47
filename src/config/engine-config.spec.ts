import { ConfigService } from '@nestjs/config';
import {
  AuctionEngine,
  isEngineError,
  LedgerPaymentAdapter,
} from '../auction/engine';
import type { EngineSettings } from './configuration';
import { buildEngineConfig } from './engine-config';

const settings = (overrides: Partial<EngineSettings> = {}): EngineSettings => ({
  admin: 'root',
  auctioneers: ['ann'],
  operators: [],
  maintainers: ['max'],
  recovery: [],
  platformFeePercentage: 2,
  maxFeePercentage: 10,
  rateLimitPeriodSeconds: 3600,
  maxActionsPerPeriod: 100,
  actionCooldownSeconds: 60,
  ...overrides,
});

describe('buildEngineConfig', () => {
  it('maps the engine section onto role grants and limits', () => {
    const config = new ConfigService({ engine: settings() });
    expect(buildEngineConfig(config)).toEqual({
      roles: {
        admin: 'root',
        auctioneers: ['ann'],
        operators: [],
        maintainers: ['max'],
        recovery: [],
      },
      platformFeePercentage: 2,
      maxFeePercentage: 10,
      rateLimitPeriodSeconds: 3600,
      maxActionsPerPeriod: 100,
      actionCooldownSeconds: 60,
    });
  });

  it('leaves validation to the engine', () => {
    const build = (overrides: Partial<EngineSettings>) => () =>
      new AuctionEngine(
        buildEngineConfig(new ConfigService({ engine: settings(overrides) })),
        new LedgerPaymentAdapter(),
      );
    const kind = (fn: () => unknown) => {
      try {
        fn();
        return 'none';
      } catch (err) {
        return isEngineError(err) ? err.kind : 'other';
      }
    };
    expect(kind(build({ admin: undefined }))).toBe('Unauthorized');
    expect(kind(build({ platformFeePercentage: 11 }))).toBe(
      'InvalidFeePercentage',
    );
    expect(kind(build({ actionCooldownSeconds: 2.5 }))).toBe('InvalidAmount');
    expect(kind(build({}))).toBe('none');
  });
});

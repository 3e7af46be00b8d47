export interface OpeningBalance {
  asset: string;
  holder: string;
  amount: number;
}

export interface EngineSettings {
  admin?: string;
  auctioneers: string[];
  operators: string[];
  maintainers: string[];
  recovery: string[];
  platformFeePercentage: number;
  maxFeePercentage: number;
  rateLimitPeriodSeconds: number;
  maxActionsPerPeriod: number;
  actionCooldownSeconds: number;
}

export interface AppConfig {
  port: number;
  redis: { url: string };
  audit: { enabled: boolean; streamKey: string; maxLength: number };
  clerk: { secretKey?: string };
  engine: EngineSettings;
  auction: { autoEnd: boolean };
  ledger: { openingBalances: OpeningBalance[] };
}

const list = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

// Not rounded: the engine rejects non-integers.
const numeric = (value: string | undefined, fallback: number): number =>
  value === undefined || value.trim() === '' ? fallback : Number(value);

const flag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
};

export function parseOpeningBalances(
  value: string | undefined,
): OpeningBalance[] {
  return list(value).map((entry) => {
    const [asset, holder, amount, ...rest] = entry.split(':');
    const parsed = Number(amount);
    const valid = Number.isSafeInteger(parsed) && parsed >= 0;
    if (!asset || !holder || rest.length > 0 || !valid) {
      throw new Error(
        `Invalid LEDGER_OPENING_BALANCES entry "${entry}" (expected asset:holder:amount)`,
      );
    }
    return { asset, holder, amount: parsed };
  });
}

export default (): AppConfig => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  redis: {
    url: process.env.REDIS_URL ?? 'redis://localhost:6379',
  },
  audit: {
    enabled: flag(process.env.AUDIT_STREAM_ENABLED, true),
    streamKey: process.env.AUDIT_STREAM_KEY ?? 'auction:events',
    maxLength: numeric(process.env.AUDIT_STREAM_MAXLEN, 10_000),
  },
  clerk: {
    secretKey: process.env.CLERK_SECRET_KEY,
  },
  engine: {
    admin: process.env.ENGINE_ADMIN?.trim() || undefined,
    auctioneers: list(process.env.ENGINE_AUCTIONEERS),
    operators: list(process.env.ENGINE_OPERATORS),
    maintainers: list(process.env.ENGINE_MAINTAINERS),
    recovery: list(process.env.ENGINE_RECOVERY),
    platformFeePercentage: numeric(process.env.PLATFORM_FEE_PERCENTAGE, 0),
    maxFeePercentage: numeric(process.env.MAX_FEE_PERCENTAGE, 10),
    rateLimitPeriodSeconds: numeric(
      process.env.RATE_LIMIT_PERIOD_SECONDS,
      3600,
    ),
    maxActionsPerPeriod: numeric(process.env.MAX_ACTIONS_PER_PERIOD, 100),
    actionCooldownSeconds: numeric(process.env.ACTION_COOLDOWN_SECONDS, 60),
  },
  auction: {
    autoEnd: flag(process.env.AUTO_END_AUCTIONS, true),
  },
  ledger: {
    openingBalances: parseOpeningBalances(process.env.LEDGER_OPENING_BALANCES),
  },
});

import { z } from 'zod';

const parseList = (v: unknown, fallback: string[]): string[] => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return v
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  PRIMARY_INSTRUMENTS: z.string().optional(),
  STOCK_INSTRUMENTS: z.string().optional(),
  MAX_STOCK_SCANS: z.coerce.number().int().nonnegative().default(3),

  MIN_CONFIDENCE: z.coerce.number().min(0).max(100).default(75),
  MAX_SIGNALS_PER_DAY: z.coerce.number().int().nonnegative().default(8),

  MIN_RISK_REWARD: z.coerce.number().positive().default(2.0),
  MAX_RISK_PER_TRADE: z.coerce.number().positive().default(500),
  MAX_POSITION_UNITS: z.coerce.number().int().min(1).default(10),

  HISTORY_LOOKBACK: z.coerce.number().int().min(50).default(200),
  SESSION_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(330),

  SCAN_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  DATA_DIR: z.string().default('./data')
});

export const configSchema = rawSchema.transform((raw) => ({
  nodeEnv: raw.NODE_ENV,
  logLevel: raw.LOG_LEVEL,

  instruments: {
    primary: parseList(raw.PRIMARY_INSTRUMENTS, ['NIFTY', 'BANKNIFTY']),
    stocks: parseList(raw.STOCK_INSTRUMENTS, ['RELIANCE', 'HDFC', 'ICICIBANK', 'INFY', 'TCS']),
    maxStockScans: raw.MAX_STOCK_SCANS
  },

  engine: {
    minConfidence: raw.MIN_CONFIDENCE,
    maxSignalsPerDay: raw.MAX_SIGNALS_PER_DAY,
    historyLookback: raw.HISTORY_LOOKBACK,
    sessionUtcOffsetMinutes: raw.SESSION_UTC_OFFSET_MINUTES
  },

  risk: {
    minRiskReward: raw.MIN_RISK_REWARD,
    maxRiskPerTrade: raw.MAX_RISK_PER_TRADE,
    maxPositionUnits: raw.MAX_POSITION_UNITS
  },

  scanIntervalMs: raw.SCAN_INTERVAL_MS,
  dataDir: raw.DATA_DIR
}));

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** History or chain too short to analyse. The instrument is skipped for the cycle. */
export class InsufficientDataError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INSUFFICIENT_DATA', details);
  }
}

export class RiskRewardError extends AppError {
  constructor(riskReward: number, minimum: number) {
    super(
      `reward-to-risk ${riskReward.toFixed(2)} is below the minimum ${minimum.toFixed(2)}`,
      'RISK_REWARD_BELOW_MINIMUM',
      { riskReward, minimum }
    );
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export class MarketDataError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MARKET_DATA_INVALID', details);
  }
}

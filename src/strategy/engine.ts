/**
 * Signal Engine: orchestrates the options signal pipeline per instrument.
 *
 *   FETCH_CHAIN → ANALYZE_OI → FETCH_HISTORY → ANALYZE_TECHNICAL
 *   → RESOLVE_DIRECTION → SELECT_STRIKE → COMPUTE_RISK → EMIT | REJECT
 *
 * Every stage after the fetches is synchronous. A failed stage rejects only
 * the instrument being evaluated.
 */

import type { OptionChain, PriceBar } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { InsufficientDataError } from '../core/errors.js';
import type { MarketDataProvider } from '../data/marketDataProvider.js';
import type { DailySignalCounter } from '../risk/dailySignalCounter.js';
import { RiskCalculator } from '../risk/riskCalculator.js';
import type {
  EvaluationOutcome,
  PipelineStage,
  RejectReason,
  Signal,
  TechnicalSnapshot,
} from './types.js';
import { OpenInterestAnalyzer } from './options/openInterestAnalyzer.js';
import { selectStrike } from './options/strikeSelector.js';
import { TechnicalAnalyzer } from './technical/technicalAnalyzer.js';
import { IndicatorCalculator } from './technical/indicatorCalculator.js';
import { resolveSignalType } from './decision/signalTypeResolver.js';
import { createSignal } from './construction/signalFactory.js';

export interface SignalEngineConfig {
  minConfidence: number;
  historyLookback: number;
  sessionUtcOffsetMinutes?: number;
}

export interface SignalEngineDeps {
  marketData: MarketDataProvider;
  counter: DailySignalCounter;
  logger: Logger;
  metrics: Metrics;
  oiAnalyzer?: OpenInterestAnalyzer;
  technicalAnalyzer?: TechnicalAnalyzer;
  riskCalculator?: RiskCalculator;
  now?: () => number;
  newId?: () => string;
}

export interface ScanPlan {
  primary: readonly string[];
  stocks: readonly string[];
  maxStockScans: number;
}

export class SignalEngine {
  private readonly marketData: MarketDataProvider;
  private readonly counter: DailySignalCounter;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly oiAnalyzer: OpenInterestAnalyzer;
  private readonly technicalAnalyzer: TechnicalAnalyzer;
  private readonly riskCalculator: RiskCalculator;
  private readonly now: () => number;
  private readonly newId: (() => string) | undefined;

  constructor(private readonly config: SignalEngineConfig, deps: SignalEngineDeps) {
    this.marketData = deps.marketData;
    this.counter = deps.counter;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.oiAnalyzer = deps.oiAnalyzer ?? new OpenInterestAnalyzer();
    this.technicalAnalyzer =
      deps.technicalAnalyzer ?? new TechnicalAnalyzer(new IndicatorCalculator({}, config.sessionUtcOffsetMinutes));
    this.riskCalculator = deps.riskCalculator ?? new RiskCalculator();
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId;
  }

  /** Public entry point: a finished Signal, or null when the instrument does not qualify. */
  async evaluate(instrument: string): Promise<Signal | null> {
    const outcome = await this.evaluateDetailed(instrument);
    return outcome.status === 'emitted' ? outcome.signal : null;
  }

  /** Called by the scheduler once per trading day. */
  resetDailyCounters(): void {
    const emitted = this.counter.count;
    this.counter.reset();
    this.logger.info('daily signal counter reset', { emitted, limit: this.counter.limit });
  }

  /**
   * Primary instruments first, then up to `maxStockScans` stocks, stopping
   * once the daily quota is used. An instrument that throws is logged and
   * skipped.
   */
  async scan(plan: ScanPlan): Promise<Signal[]> {
    const queue = [...plan.primary, ...plan.stocks.slice(0, Math.max(0, plan.maxStockScans))];
    const signals: Signal[] = [];

    for (const instrument of queue) {
      if (this.counter.remaining === 0) {
        this.logger.info('daily signal limit reached, scan stopped', { limit: this.counter.limit, instrument });
        break;
      }
      try {
        const signal = await this.evaluate(instrument);
        if (signal) signals.push(signal);
      } catch (err) {
        this.metrics.increment('signal_engine.failed');
        this.logger.error('instrument evaluation failed', {
          instrument,
          err: String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
      }
    }

    this.logger.info('scan complete', { scanned: queue.length, emitted: signals.length });
    return signals;
  }

  async evaluateDetailed(instrument: string): Promise<EvaluationOutcome> {
    const log = this.logger.child({ instrument });
    const reject = (stage: PipelineStage, reason: RejectReason, detail: string): EvaluationOutcome => {
      this.metrics.increment('signal_engine.rejected', 1, { reason });
      const context = { stage, reason, detail };
      if (reason === 'upstream_unavailable') log.warn('instrument skipped: upstream unavailable', context);
      else if (reason === 'insufficient_data') log.info('instrument skipped: insufficient data', context);
      else log.debug('no signal', context);
      return { status: 'rejected', instrument, stage, reason, detail };
    };

    if (this.counter.remaining === 0) {
      return reject('FETCH_CHAIN', 'daily_limit', `daily limit ${this.counter.limit} reached`);
    }

    // ── 1. Option chain ────────────────────────────────────────────────
    let chain: OptionChain | null;
    try {
      chain = await this.marketData.getOptionChain(instrument);
    } catch (err) {
      return reject('FETCH_CHAIN', 'upstream_unavailable', `option chain fetch failed: ${String(err)}`);
    }
    if (!chain) return reject('FETCH_CHAIN', 'upstream_unavailable', 'no option chain');
    if (chain.contracts.length === 0) return reject('FETCH_CHAIN', 'insufficient_data', 'option chain is empty');

    if (!(chain.spotPrice > 0)) {
      const spot = await this.fetchSpot(instrument, log);
      if (!(spot > 0)) return reject('FETCH_CHAIN', 'upstream_unavailable', 'no spot price');
      chain = { ...chain, spotPrice: spot };
    }

    // ── 2. Open interest ───────────────────────────────────────────────
    const oi = this.oiAnalyzer.analyze(chain);
    if (!oi) return reject('ANALYZE_OI', 'insufficient_data', 'chain needs calls and puts with open interest');

    // ── 3. Price history ───────────────────────────────────────────────
    let bars: PriceBar[];
    try {
      bars = await this.marketData.getPriceHistory(instrument, this.config.historyLookback);
    } catch (err) {
      return reject('FETCH_HISTORY', 'upstream_unavailable', `price history fetch failed: ${String(err)}`);
    }
    if (bars.length === 0) return reject('FETCH_HISTORY', 'upstream_unavailable', 'no price history');

    // ── 4. Technicals ──────────────────────────────────────────────────
    let technical: TechnicalSnapshot;
    try {
      technical = this.technicalAnalyzer.analyze(bars);
    } catch (err) {
      if (err instanceof InsufficientDataError) {
        return reject('ANALYZE_TECHNICAL', 'insufficient_data', err.message);
      }
      throw err;
    }

    // ── 5. Direction ───────────────────────────────────────────────────
    const call = resolveSignalType(oi, technical);
    if (!call) {
      return reject(
        'RESOLVE_DIRECTION',
        'no_opportunity',
        `OI ${oi.sentiment}, trend ${technical.trend}, RSI ${technical.indicators.rsi.toFixed(1)}`
      );
    }
    if (call.confidence < this.config.minConfidence) {
      return reject(
        'RESOLVE_DIRECTION',
        'below_min_confidence',
        `confidence ${call.confidence} below ${this.config.minConfidence}`
      );
    }

    // ── 6. Contract ────────────────────────────────────────────────────
    const contract = selectStrike({
      direction: call.direction,
      kind: call.kind,
      contracts: chain.contracts,
      spotPrice: chain.spotPrice,
    });
    if (!contract) return reject('SELECT_STRIKE', 'no_contract', `no contract for ${call.direction}`);

    // ── 7. Risk ────────────────────────────────────────────────────────
    const risk = this.riskCalculator.compute({
      entryPrice: contract.lastPrice,
      direction: call.direction,
      technical,
      confidence: call.confidence,
    });
    if (!risk.ok) return reject('COMPUTE_RISK', 'risk_reward', risk.reason);

    // ── 8. Emit ────────────────────────────────────────────────────────
    const signal = createSignal(
      { instrument, contract, call, plan: risk.plan, oi, technical },
      {
        minRiskReward: this.riskCalculator.config.minRiskReward,
        now: this.now,
        ...(this.newId ? { newId: this.newId } : {}),
      }
    );

    // Nothing is awaited between here and the increment.
    if (!this.counter.tryAcquire()) {
      return reject('EMIT', 'daily_limit', `daily limit ${this.counter.limit} reached`);
    }

    this.metrics.increment('signal_engine.emitted', 1, { direction: signal.direction });
    log.info('signal emitted', {
      direction: signal.direction,
      contract: signal.contract.tradingSymbol,
      confidence: signal.confidence,
      riskReward: Number(signal.riskReward.toFixed(2)),
      emittedToday: this.counter.count,
    });
    return { status: 'emitted', instrument, signal };
  }

  private async fetchSpot(instrument: string, log: Logger): Promise<number> {
    try {
      return await this.marketData.getSpotPrice(instrument);
    } catch (err) {
      log.warn('spot price fetch failed', { err: String(err) });
      return 0;
    }
  }
}

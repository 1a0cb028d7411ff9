import type { AppConfig } from '../config/types.js';
import type { Logger } from '../core/logger.js';
import type { AlertService } from '../alerts/interface.js';
import { deliverSignal, signalTemplates } from '../alerts/signalTemplates.js';
import type { DailySignalCounter } from '../risk/dailySignalCounter.js';
import type { SignalEngine } from '../strategy/engine.js';
import type { Signal } from '../strategy/types.js';

/** `YYYY-MM-DD` of `now` shifted by the exchange's UTC offset. */
export const sessionDate = (now: number, utcOffsetMinutes: number): string =>
  new Date(now + utcOffsetMinutes * 60_000).toISOString().slice(0, 10);

/**
 * The scheduling side of the engine: periodic scans and the day-rollover
 * reset. The engine itself never looks at the calendar.
 */
export class SignalLoops {
  private currentSession: string;
  private limitAlerted = false;

  constructor(
    private readonly config: AppConfig,
    private readonly engine: SignalEngine,
    private readonly counter: DailySignalCounter,
    private readonly alert: AlertService,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.currentSession = sessionDate(this.now(), config.engine.sessionUtcOffsetMinutes);
  }

  async runScan(): Promise<Signal[]> {
    const signals = await this.engine.scan(this.config.instruments);

    for (const signal of signals) {
      try {
        await deliverSignal(this.alert, signal);
      } catch (err) {
        this.logger.error('signal delivery failed', { signalId: signal.id, instrument: signal.instrument, err: String(err) });
      }
    }

    if (this.counter.remaining === 0 && !this.limitAlerted) {
      this.limitAlerted = true;
      const t = signalTemplates.dailyLimitReached(this.counter.limit);
      await this.alert.notify(t.title, t.message, { severity: t.severity });
    }
    return signals;
  }

  /** Resets the daily counter when the session date changes. Returns true on rollover. */
  checkDayRollover(): boolean {
    const today = sessionDate(this.now(), this.config.engine.sessionUtcOffsetMinutes);
    if (today === this.currentSession) return false;
    this.logger.info('session rollover', { from: this.currentSession, to: today });
    this.currentSession = today;
    this.limitAlerted = false;
    this.engine.resetDailyCounters();
    return true;
  }
}

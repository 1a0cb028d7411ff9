import { loadConfig } from './config/load.js';
import { JsonLogger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { ConsoleAlertService } from './alerts/console.js';
import { signalTemplates } from './alerts/signalTemplates.js';
import { JsonFileMarketDataProvider } from './data/fileMarketData.js';
import { DailySignalCounter } from './risk/dailySignalCounter.js';
import { RiskCalculator } from './risk/riskCalculator.js';
import { SignalEngine } from './strategy/engine.js';
import { Scheduler } from './jobs/scheduler.js';
import { SignalLoops } from './jobs/loops.js';

const ROLLOVER_CHECK_MS = 60_000;

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel);
  const metrics = new InMemoryMetrics();
  const alert = new ConsoleAlertService();

  const counter = new DailySignalCounter(config.engine.maxSignalsPerDay);
  const engine = new SignalEngine(
    {
      minConfidence: config.engine.minConfidence,
      historyLookback: config.engine.historyLookback,
      sessionUtcOffsetMinutes: config.engine.sessionUtcOffsetMinutes,
    },
    {
      marketData: new JsonFileMarketDataProvider(config.dataDir),
      counter,
      logger,
      metrics,
      riskCalculator: new RiskCalculator(config.risk),
    }
  );

  const loops = new SignalLoops(config, engine, counter, alert, logger);
  const scheduler = new Scheduler(logger);

  const instruments = [...config.instruments.primary, ...config.instruments.stocks.slice(0, config.instruments.maxStockScans)];
  const startup = signalTemplates.systemStartup(instruments, config.engine.maxSignalsPerDay);
  await alert.notify(startup.title, startup.message, { severity: startup.severity });

  scheduler.add('signal-scan', config.scanIntervalMs, async () => {
    await loops.runScan();
  }, { runImmediately: true });
  scheduler.add('day-rollover', ROLLOVER_CHECK_MS, async () => {
    loops.checkDayRollover();
  });

  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal, metrics: metrics.snapshot() });
    scheduler.shutdown();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('signal engine started', {
    instruments,
    dataDir: config.dataDir,
    scanIntervalMs: config.scanIntervalMs,
    maxSignalsPerDay: config.engine.maxSignalsPerDay,
  });
};

main().catch((err: unknown) => {
  process.stderr.write(`${JSON.stringify({ level: 'error', message: 'startup failed', err: String(err) })}\n`);
  process.exit(1);
});

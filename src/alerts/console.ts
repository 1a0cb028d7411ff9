import type { LogSink } from '../core/logger.js';
import type { AlertService } from './interface.js';

export class ConsoleAlertService implements AlertService {
  constructor(private readonly sink: LogSink = (line) => process.stdout.write(`${line}\n`)) {}

  async notify(title: string, message: string, context?: Record<string, unknown>): Promise<void> {
    this.sink(JSON.stringify({ ts: new Date().toISOString(), alert: title, message, ...context }));
  }
}

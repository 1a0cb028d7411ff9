export type AlertSeverity = 'info' | 'warn';

/** Delivery channel. Receives pre-rendered text plus the structured fields. */
export interface AlertService {
  notify(title: string, message: string, context?: Record<string, unknown>): Promise<void>;
}

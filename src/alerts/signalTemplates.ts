/**
 * Signal Templates: render engine output for delivery channels.
 *
 * The engine only produces structured Signals; everything user-facing is
 * formatted here.
 */

import type { Direction, Signal } from '../strategy/types.js';
import type { AlertService, AlertSeverity } from './interface.js';

export interface AlertTemplate {
  title: string;
  message: string;
  severity: AlertSeverity;
}

const DIRECTION_LABEL: Record<Direction, string> = {
  BUY_CALL: '🟢 BUY CE',
  BUY_PUT: '🔴 BUY PE',
  SELL_CALL: '🔴 SELL CE',
  SELL_PUT: '🟢 SELL PE',
};

const price = (v: number): string => `₹${v.toFixed(2)}`;

const pct = (from: number, to: number): string => {
  const change = ((to - from) / from) * 100;
  return `${change >= 0 ? '+' : ''}${change.toFixed(1)}%`;
};

export const signalTemplates = {
  signalEmitted(signal: Signal): AlertTemplate {
    const { contract } = signal;
    return {
      title: `${DIRECTION_LABEL[signal.direction]} ${signal.instrument} ${contract.strike}`,
      message: [
        `Contract: ${contract.tradingSymbol} (exp ${contract.expiry})`,
        `Entry: ${price(signal.entryPrice)}`,
        `Target: ${price(signal.targetPrice)} (${pct(signal.entryPrice, signal.targetPrice)})`,
        `Stop Loss: ${price(signal.stopLoss)} (${pct(signal.entryPrice, signal.stopLoss)})`,
        `Quantity: ${signal.quantity} lot${signal.quantity === 1 ? '' : 's'}`,
        `Confidence: ${signal.confidence}% (${signal.confidenceTier})`,
        `Risk:Reward 1:${signal.riskReward.toFixed(2)}`,
        `Setup: ${signal.technicalSetup}`,
        `VWAP: ${signal.vwapContext}`,
        `Time Decay: ${signal.timeDecay}`,
        `Volume: ${signal.volumeProfile}`,
        `Why: ${signal.rationale}`,
      ].join('\n'),
      severity: 'info',
    };
  },

  dailyLimitReached(limit: number): AlertTemplate {
    return {
      title: '⚠️ Daily Signal Limit Reached',
      message: `${limit} signals emitted today. Scanning resumes after the daily reset.`,
      severity: 'warn',
    };
  },

  systemStartup(instruments: readonly string[], maxSignalsPerDay: number): AlertTemplate {
    return {
      title: '🚀 Signal Engine Started',
      message: `Instruments: ${instruments.join(', ')}\nDaily limit: ${maxSignalsPerDay}`,
      severity: 'info',
    };
  },
};

export const deliverSignal = async (alert: AlertService, signal: Signal): Promise<void> => {
  const t = signalTemplates.signalEmitted(signal);
  await alert.notify(t.title, t.message, {
    severity: t.severity,
    signalId: signal.id,
    instrument: signal.instrument,
    direction: signal.direction,
    contract: signal.contract.tradingSymbol,
    entryPrice: signal.entryPrice,
    targetPrice: signal.targetPrice,
    stopLoss: signal.stopLoss,
    confidence: signal.confidence,
  });
};

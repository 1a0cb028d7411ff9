import { describe, it, expect } from 'vitest';
import { deliverSignal, signalTemplates } from '../../src/alerts/signalTemplates.js';
import { ConsoleAlertService } from '../../src/alerts/console.js';
import { createSignal } from '../../src/strategy/construction/signalFactory.js';
import type { Signal } from '../../src/strategy/types.js';
import { SESSION_OPEN, createMockAlert, makeContract, makeOi, makeTechnical } from '../helpers.js';

const makeSignal = (quantity = 10): Signal =>
  createSignal(
    {
      instrument: 'NIFTY',
      contract: makeContract({ strike: 19900, lastPrice: 150 }),
      call: { direction: 'BUY_CALL', kind: 'confluence', confidence: 95 },
      plan: {
        entryPrice: 150,
        targetPrice: 187.5,
        stopLoss: 135,
        targetPct: 0.25,
        stopPct: 0.1,
        riskReward: 2.5,
        quantity,
        perUnitRisk: 15,
      },
      oi: makeOi(),
      technical: makeTechnical(),
    },
    { minRiskReward: 2, now: () => SESSION_OPEN, newId: () => 'sig-1' }
  );

describe('signalTemplates', () => {
  it('formats signalEmitted', () => {
    const t = signalTemplates.signalEmitted(makeSignal());
    expect(t.title).toBe('🟢 BUY CE NIFTY 19900');
    expect(t.severity).toBe('info');
    expect(t.message.split('\n')).toEqual([
      'Contract: NIFTY26OCT19900CE (exp 2026-10-27)',
      'Entry: ₹150.00',
      'Target: ₹187.50 (+25.0%)',
      'Stop Loss: ₹135.00 (-10.0%)',
      'Quantity: 10 lots',
      'Confidence: 95% (VERY_HIGH)',
      'Risk:Reward 1:2.50',
      'Setup: Upward Breakout | Bullish Trend | Strength: 75%',
      'VWAP: Near VWAP (+0.2%)',
      'Time Decay: Medium',
      'Volume: Above Average',
      'Why: OI shows bullish sentiment (PCR: 1.50) | RSI at 55.0 shows balanced momentum | ' +
        'Chart shows upward breakout formation | Overall trend is bullish',
    ]);
  });

  it('uses the singular for one lot', () => {
    const t = signalTemplates.signalEmitted(makeSignal(1));
    expect(t.message).toContain('Quantity: 1 lot\n');
  });

  it('formats dailyLimitReached as a warning', () => {
    const t = signalTemplates.dailyLimitReached(8);
    expect(t.severity).toBe('warn');
    expect(t.message).toBe('8 signals emitted today. Scanning resumes after the daily reset.');
  });

  it('formats systemStartup', () => {
    const t = signalTemplates.systemStartup(['NIFTY', 'BANKNIFTY'], 8);
    expect(t.title).toContain('Started');
    expect(t.severity).toBe('info');
    expect(t.message).toBe('Instruments: NIFTY, BANKNIFTY\nDaily limit: 8');
  });
});

describe('deliverSignal', () => {
  it('sends the rendered text', async () => {
    const alert = createMockAlert();
    await deliverSignal(alert, makeSignal());
    expect(alert.calls).toHaveLength(1);
    expect(alert.calls[0]?.title).toBe('🟢 BUY CE NIFTY 19900');
  });
});

describe('ConsoleAlertService', () => {
  it('writes one JSON line with the context fields', async () => {
    const lines: string[] = [];
    const svc = new ConsoleAlertService((line) => lines.push(line));
    await deliverSignal(svc, makeSignal());

    expect(lines).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    expect(entry.alert).toBe('🟢 BUY CE NIFTY 19900');
    expect(entry.signalId).toBe('sig-1');
    expect(entry.contract).toBe('NIFTY26OCT19900CE');
    expect(entry.targetPrice).toBe(187.5);
    expect(typeof entry.ts).toBe('string');
  });
});

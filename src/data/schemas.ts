import { z } from 'zod';

export const priceBarSchema = z.object({
  time: z.number().int().nonnegative(),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().nonnegative().default(0),
});

export const priceHistorySchema = z
  .array(priceBarSchema)
  .refine((bars) => bars.every((b, i) => i === 0 || b.time > bars[i - 1]!.time), {
    message: 'bars must be strictly ascending by time',
  });

export const optionContractSchema = z.object({
  underlying: z.string().min(1),
  tradingSymbol: z.string().min(1),
  strike: z.number().positive(),
  type: z.enum(['CALL', 'PUT']),
  expiry: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  lastPrice: z.number().finite().nonnegative(),
  openInterest: z.number().finite().nonnegative(),
  volume: z.number().finite().nonnegative().default(0),
});

export const optionChainSchema = z.object({
  underlying: z.string().min(1),
  spotPrice: z.number().finite().nonnegative(),
  timestamp: z.number().int().nonnegative(),
  contracts: z.array(optionContractSchema),
});

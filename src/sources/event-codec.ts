import { z } from 'zod';
import { ChainEvent } from '../types';
import { ValidationError } from '../types/errors';

// Amounts travel as decimal strings; JSON numbers cannot hold 18-decimal quantities
const AmountSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer string')
  .transform(value => BigInt(value));

const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'Invalid address')
  .transform(value => value.toLowerCase());

const LaunchIdSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Invalid launch id')
  .transform(value => value.toLowerCase());

const ChainIdSchema = z.number().int().positive();
// Sequences are compared as numbers, so they must stay exact
const SeqSchema = z
  .number()
  .int()
  .positive()
  .refine(Number.isSafeInteger, { message: 'seq must be a safe integer' });

export const TokenCreatedSchema = z.object({
  type: z.literal('TokenCreated'),
  launchId: LaunchIdSchema,
  name: z.string().min(1).max(64),
  symbol: z.string().min(1).max(16),
  creator: AddressSchema,
  originChainId: ChainIdSchema,
  targetChainIds: z.array(ChainIdSchema).min(1).max(64),
  originToken: AddressSchema,
  creatorFeeBps: z.number().int().min(0).max(10_000).optional()
});

export const TokenPurchaseSchema = z.object({
  type: z.literal('TokenPurchase'),
  launchId: LaunchIdSchema,
  buyer: AddressSchema,
  ethIn: AmountSchema,
  tokensOut: AmountSchema,
  price: AmountSchema,
  seq: SeqSchema
});

export const TokenSaleSchema = z.object({
  type: z.literal('TokenSale'),
  launchId: LaunchIdSchema,
  seller: AddressSchema,
  tokensIn: AmountSchema,
  ethOut: AmountSchema,
  price: AmountSchema,
  seq: SeqSchema
});

export const CurveMigrationTriggeredSchema = z.object({
  type: z.literal('CurveMigrationTriggered'),
  launchId: LaunchIdSchema,
  finalPrice: AmountSchema,
  liquidityEth: AmountSchema,
  liquidityTokens: AmountSchema
});

export const ChainEventSchema = z.discriminatedUnion('type', [
  TokenCreatedSchema,
  TokenPurchaseSchema,
  TokenSaleSchema,
  CurveMigrationTriggeredSchema
]);

export type WireChainEvent = z.input<typeof ChainEventSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'event'}: ${issue.message}`).join('; ');
}

export function decodeChainEvent(payload: unknown): ChainEvent {
  const result = ChainEventSchema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(`Malformed chain event: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function encodeChainEvent(event: ChainEvent): WireChainEvent {
  switch (event.type) {
    case 'TokenCreated':
      return { ...event, targetChainIds: [...event.targetChainIds] };
    case 'TokenPurchase':
      return {
        ...event,
        ethIn: event.ethIn.toString(),
        tokensOut: event.tokensOut.toString(),
        price: event.price.toString()
      };
    case 'TokenSale':
      return {
        ...event,
        tokensIn: event.tokensIn.toString(),
        ethOut: event.ethOut.toString(),
        price: event.price.toString()
      };
    case 'CurveMigrationTriggered':
      return {
        ...event,
        finalPrice: event.finalPrice.toString(),
        liquidityEth: event.liquidityEth.toString(),
        liquidityTokens: event.liquidityTokens.toString()
      };
  }
}

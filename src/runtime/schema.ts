import { z } from 'zod';

export const TABLE_FORMAT = 'fsm-table';
export const TABLE_VERSION = 1;

const CapabilitySchema = z.enum(['equality', 'duplication', 'formatting', 'hashability']);

const NameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier');

export const FsmTableSchema = z.object({
  format: z.literal(TABLE_FORMAT),
  version: z.literal(TABLE_VERSION),
  namespace: NameSchema.nullable(),
  initial: NameSchema,
  states: z.array(NameSchema).min(1),
  events: z.array(NameSchema),
  derive: z.object({
    states: z.array(CapabilitySchema),
    events: z.array(CapabilitySchema),
  }),
  // [stateIndex, eventIndex, targetIndex]
  transitions: z.array(z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative(), z.number().int().nonnegative()])),
});

export type FsmTableDocument = z.infer<typeof FsmTableSchema>;

import { z } from 'zod'

// The endpoint sends ids and amounts as strings; accept numbers too
const IdSchema = z.union([z.string(), z.number()]).transform((value) => String(value))

// Inventory endpoint response
export const AssetSchema = z.object({
  assetid: IdSchema,
  classid: IdSchema,
  amount: IdSchema,
  instanceid: IdSchema.optional(),
})

export const DescriptionSchema = z.object({
  classid: IdSchema,
  instanceid: IdSchema.default('0'),
  market_hash_name: z.string().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
})

export const InventoryResponseSchema = z.object({
  assets: z.array(AssetSchema),
  descriptions: z.array(DescriptionSchema).optional(),
})

// Persisted snapshot file
export const InventoryItemSchema = z.object({
  classid: z.string(),
  amount: z.string(),
  instanceid: z.string(),
})

export const SnapshotFileSchema = z.record(z.string(), InventoryItemSchema)

// Config file; every field optional, defaults are applied by ConfigLoader
export const PushTransportSchema = z.enum(['pushplus', 'serverchan', 'bark'])

export const MonitorConfigFileSchema = z.object({
  accountId: z.string().min(1).optional(),
  appId: z.number().int().positive().optional(),
  contextId: z.number().int().nonnegative().optional(),
  dataFile: z.string().min(1).optional(),
  intervalSeconds: z.number().positive().optional(),
  fetch: z.object({
    host: z.string().min(1).optional(),
    userAgent: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }).optional(),
  push: z.object({
    transport: PushTransportSchema.optional(),
    token: z.string().min(1).optional(),
    title: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }).optional(),
})

export type MonitorConfigFile = z.infer<typeof MonitorConfigFileSchema>

// Type guards
export const isPushTransport = (value: string): value is z.infer<typeof PushTransportSchema> =>
  PushTransportSchema.safeParse(value).success

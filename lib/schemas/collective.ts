import { z } from 'zod'
import { ConfigurationError } from '@/lib/errors'
import { DEFAULT_TIME_ZONE } from '@/types/collective'
import type { CollectiveConfig } from '@/types/collective'

/**
 * Collective Configuration Validation Schema
 *
 * Validates the member/meter graph before anything is billed
 */

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a date in YYYY-MM-DD format')
const monthStart = isoDate.refine((date) => date.endsWith('-01'), 'Must be the first day of a month')
const rate = z.number().finite().min(0, 'Rate must not be negative')

export const meterSchema = z.object({
  externalId: z.string().min(1, 'Meter ID is required'),
  name: z.string().default(''),
  isProduction: z.boolean().default(false),
  isVirtual: z.boolean().default(false),
})

export const feeSchema = z.object({
  name: z.string().min(1, 'Fee name is required'),
  kind: z.enum(['yearly', 'per_kwh']),
  value: z.number().finite(),
  basis: z.enum(['local', 'grid']).default('grid'),
})

export const memberSchema = z
  .object({
    id: z.string().min(1, 'Member ID is required'),
    firstName: z.string().default(''),
    lastName: z.string().default(''),
    street: z.string().default(''),
    zip: z.string().default(''),
    city: z.string().default(''),
    canton: z.string().default(''),
    isHost: z.boolean().default(false),
    meters: z.array(meterSchema).default([]),
    fees: z.array(feeSchema).default([]),
  })
  .superRefine((member, ctx) => {
    const feeNames = new Set<string>()
    member.fees.forEach((fee, j) => {
      if (feeNames.has(fee.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate fee "${fee.name}"`,
          path: ['fees', j, 'name'],
        })
      }
      feeNames.add(fee.name)
    })
  })

export const ratesSchema = z.object({
  localRate: rate,
  gridBuyRate: rate,
  gridSellRate: rate,
})

export const rateChangeSchema = ratesSchema
  .extend({
    validFrom: isoDate,
    validTo: isoDate.nullable().default(null),
  })
  .refine((change) => !change.validTo || change.validTo >= change.validFrom, {
    message: 'Valid to date must be after valid from date',
    path: ['validTo'],
  })

export const collectiveConfigSchema = z
  .object({
    name: z.string().min(1, 'Collective name is required'),
    timeZone: z.string().min(1).default(DEFAULT_TIME_ZONE),
    currency: z.string().min(1).default('CHF'),
    billingInterval: z.enum(['monthly', 'quarterly', 'semi_annual', 'annual']).default('quarterly'),
    periodStart: monthStart,
    periodEnd: monthStart,
    rates: ratesSchema,
    rateChanges: z.array(rateChangeSchema).default([]),
    showDailyDetail: z.boolean().default(false),
    vatRate: z
      .number()
      .finite()
      .min(0, 'VAT rate must not be negative')
      .max(100, 'VAT rate must not exceed 100')
      .default(0),
    vatOnLocal: z.boolean().default(false),
    vatOnGrid: z.boolean().default(true),
    vatOnFees: z.boolean().default(true),
    members: z.array(memberSchema).min(1, 'At least one member is required'),
  })
  .superRefine((config, ctx) => {
    if (config.periodStart >= config.periodEnd) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Period start must be before period end',
        path: ['periodEnd'],
      })
    }

    const memberIds = new Set<string>()
    const meterIds = new Set<string>()
    config.members.forEach((member, i) => {
      if (memberIds.has(member.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate member ID "${member.id}"`,
          path: ['members', i, 'id'],
        })
      }
      memberIds.add(member.id)

      member.meters.forEach((meter, j) => {
        if (meterIds.has(meter.externalId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Meter "${meter.externalId}" is assigned more than once`,
            path: ['members', i, 'meters', j, 'externalId'],
          })
        }
        meterIds.add(meter.externalId)
      })
    })

    const hasHost = config.members.some((member) => {
      const virtual = member.meters.filter((m) => m.isVirtual)
      return member.isHost && virtual.some((m) => !m.isProduction) && virtual.some((m) => m.isProduction)
    })
    if (!hasHost) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'The collective needs a host with a virtual consumption and a virtual production meter',
        path: ['members'],
      })
    }
  })

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

/**
 * Parses raw configuration, throwing ConfigurationError with every issue found
 */
export function parseCollectiveConfig(raw: unknown): CollectiveConfig {
  const result = collectiveConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error))
  }
  return result.data
}

/**
 * Zod schemas for the service declaration file (svcward.yaml / .json).
 *
 * Field names are snake_case in the file; resolved ServiceDefinitions are
 * camelCase (see service-registry-impl.ts).
 */

import { z } from 'zod'
import { PartialSupervisorSettingsSchema } from '../config/config-schema.js'

// ---------------------------------------------------------------------------
// Supported declaration versions
// ---------------------------------------------------------------------------

export const SUPPORTED_DECLARATION_VERSIONS = ['1', '1.0'] as const

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

export const SERVICE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

export const ServiceNameSchema = z
  .string()
  .min(1, 'Service name is required')
  .regex(SERVICE_NAME_PATTERN, 'Service name may only contain letters, digits, ".", "_" and "-"')

const PositiveMs = z.number().int().positive()

export const HookSpecSchema = z
  .object({
    command: z.string().min(1, 'Hook command is required'),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).default({}),
    cwd: z.string().min(1).optional(),
    oneshot: z.boolean().default(false),
  })
  .strict()

export type RawHookSpec = z.infer<typeof HookSpecSchema>

// ---------------------------------------------------------------------------
// Probe targets
// ---------------------------------------------------------------------------

const ProbeTimingShape = {
  interval_ms: PositiveMs.optional(),
  timeout_ms: PositiveMs.optional(),
}

export const HttpProbeSchema = z
  .object({
    type: z.literal('http'),
    url: z
      .string()
      .min(1, 'Probe URL must not be empty')
      .url('Probe URL must be an absolute URL')
      .refine((u) => u.startsWith('http://') || u.startsWith('https://'), {
        message: 'Probe URL must use http or https',
      }),
    method: z.enum(['GET', 'HEAD']).default('GET'),
    expect_status: z.number().int().min(100).max(599).optional(),
    ...ProbeTimingShape,
  })
  .strict()

export const TcpProbeSchema = z
  .object({
    type: z.literal('tcp'),
    host: z.string().min(1, 'Probe host must not be empty').default('127.0.0.1'),
    port: z.number().int().min(1).max(65535),
    ...ProbeTimingShape,
  })
  .strict()

export const ProcessProbeSchema = z
  .object({
    type: z.literal('process'),
    ...ProbeTimingShape,
  })
  .strict()

export const ProbeSpecSchema = z.discriminatedUnion('type', [
  HttpProbeSchema,
  TcpProbeSchema,
  ProcessProbeSchema,
])

export type RawProbeSpec = z.infer<typeof ProbeSpecSchema>

// ---------------------------------------------------------------------------
// Restart policy
// ---------------------------------------------------------------------------

export const RestartPolicySchema = z
  .object({
    max_attempts: z.number().int().min(1, 'max_attempts must be at least 1').optional(),
    window_ms: z.number().int().positive('window_ms must be greater than 0').optional(),
    backoff_ms: z.number().int().min(0, 'backoff_ms must not be negative').optional(),
  })
  .strict()

// ---------------------------------------------------------------------------
// Service entry
// ---------------------------------------------------------------------------

export const ServiceEntrySchema = z
  .object({
    name: ServiceNameSchema,
    description: z.string().optional(),
    depends_on: z.array(z.string()).default([]),
    start: HookSpecSchema,
    stop: HookSpecSchema.optional(),
    probe: ProbeSpecSchema,
    restart: RestartPolicySchema.optional(),
    grace_period_ms: PositiveMs.optional(),
    hook_timeout_ms: PositiveMs.optional(),
  })
  .strict()

export type RawServiceEntry = z.infer<typeof ServiceEntrySchema>

// ---------------------------------------------------------------------------
// File-wide defaults
// ---------------------------------------------------------------------------

export const ServiceDefaultsSchema = z
  .object({
    probe: z
      .object({
        interval_ms: PositiveMs.optional(),
        timeout_ms: PositiveMs.optional(),
      })
      .strict()
      .optional(),
    restart: RestartPolicySchema.optional(),
    grace_period_ms: PositiveMs.optional(),
    hook_timeout_ms: PositiveMs.optional(),
  })
  .strict()

export type RawServiceDefaults = z.infer<typeof ServiceDefaultsSchema>

// ---------------------------------------------------------------------------
// Declaration document
// ---------------------------------------------------------------------------

export const DeclarationFileSchema = z
  .object({
    version: z.string().superRefine((v, ctx) => {
      if (!(SUPPORTED_DECLARATION_VERSIONS as readonly string[]).includes(v)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Declaration version '${v}' is not supported. Supported: ${SUPPORTED_DECLARATION_VERSIONS.join(', ')}`,
        })
      }
    }),
    settings: PartialSupervisorSettingsSchema.optional(),
    defaults: ServiceDefaultsSchema.optional(),
    services: z.array(ServiceEntrySchema).min(1, 'At least one service must be declared'),
  })
  .strict()

export type DeclarationFile = z.infer<typeof DeclarationFileSchema>

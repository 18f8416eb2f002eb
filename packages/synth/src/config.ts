import { generationConfigSchema, generationEnvSchema, type GenerationConfig, type GenerationConfigInput } from '@duka/schema'
import type { ZodError } from 'zod'
import { ConfigurationError } from './errors'

export type GeneratorSettings = {
  config: GenerationConfig
  productsCsvFile: string
}

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

export function parseGenerationConfig(input: GenerationConfigInput): GenerationConfig {
  const parsed = generationConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid generation config: ${describeIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Reads generation settings from environment variables. Per-table counts fall
 * back to `RECORD_COUNT`.
 */
export function loadGeneratorSettings(
  env: Record<string, string | undefined> = process.env,
  now: () => Date = () => new Date(),
): GeneratorSettings {
  const parsed = generationEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`)
  }
  const vars = parsed.data

  const config = parseGenerationConfig({
    customerCount: vars.CUSTOMER_COUNT ?? vars.RECORD_COUNT,
    productCount: vars.PRODUCT_COUNT ?? vars.RECORD_COUNT,
    orderCount: vars.ORDER_COUNT ?? vars.RECORD_COUNT,
    orderItemCount: vars.ORDER_ITEM_COUNT ?? vars.RECORD_COUNT,
    batchSize: vars.BATCH_SIZE,
    seed: vars.SEED,
    generatedAt: vars.GENERATED_AT ?? now(),
    orderDateStart: vars.ORDER_DATE_START,
    orderDateEnd: vars.ORDER_DATE_END,
    stapleCutoff: vars.STAPLE_CUTOFF,
  })

  return { config, productsCsvFile: vars.PRODUCTS_CSV_FILE }
}

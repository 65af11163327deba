import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

export const sampleServerConfigSchema = z.object({
  apiBaseUrl: z.string().url(),
  model: z
    .object({
      baseUrl: z.string().url(),
      model: z.string().min(1),
      apiKey: z.string().optional(),
      temperature: z.number().min(0).max(2),
      timeoutMs: z.number().int().positive()
    })
    .optional()
})

export type SampleServerConfig = z.infer<typeof sampleServerConfigSchema>

/**
 * Reads the sample server's settings. `generate_text` is only offered when
 * SAMPLE_MODEL_BASE_URL points at a chat completions endpoint.
 */
export function loadSampleServerConfig(env: NodeJS.ProcessEnv = process.env): SampleServerConfig {
  loadEnv()

  return sampleServerConfigSchema.parse({
    apiBaseUrl: env.SAMPLE_API_BASE_URL ?? 'http://127.0.0.1:5000',
    model: env.SAMPLE_MODEL_BASE_URL
      ? {
          baseUrl: env.SAMPLE_MODEL_BASE_URL,
          model: env.SAMPLE_MODEL_NAME ?? 'local-model',
          apiKey: env.SAMPLE_MODEL_API_KEY || undefined,
          temperature: Number(env.SAMPLE_MODEL_TEMPERATURE ?? 0.7),
          timeoutMs: Number(env.SAMPLE_MODEL_TIMEOUT_MS ?? 120_000)
        }
      : undefined
  })
}

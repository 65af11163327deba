import { z } from 'zod'

export const serverConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional()
})

export const serversFileSchema = z.object({
  mcpServers: z.record(serverConfigSchema)
})

export const modelProviderSchema = z.enum(['openai', 'server-tool'])

export const configSchema = z.object({
  servers: z
    .record(serverConfigSchema)
    .refine((servers) => Object.keys(servers).length > 0, {
      message: 'at least one capability server must be configured'
    }),
  model: z.object({
    provider: modelProviderSchema,
    baseUrl: z.string().url(),
    name: z.string().min(1),
    apiKey: z.string().optional(),
    temperature: z.number().min(0).max(2),
    timeoutMs: z.number().int().positive(),
    toolName: z.string().min(1),
    toolArgument: z.string().min(1)
  }),
  systemPrompt: z.string().min(1),
  maxToolRounds: z.number().int().min(0),
  retry: z.object({
    attempts: z.number().int().min(1),
    backoffMs: z.number().int().min(0)
  }),
  log: z.object({
    muted: z.boolean(),
    level: z.enum(['info', 'warn', 'error'])
  })
})

export type ServerConfig = z.infer<typeof serverConfigSchema>
export type ModelProvider = z.infer<typeof modelProviderSchema>
export type ChatbotConfig = z.infer<typeof configSchema>

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'

import { errorMessage } from '../core/errors.js'
import { tryParseJson } from '../core/json.js'
import {
  requestChatCompletion,
  type ChatCompletionOptions,
  type HttpResponseLike
} from '../core/openai-compatible-client.js'
import type { Logger } from '../core/types.js'

export interface SampleServerOptions {
  apiBaseUrl: string
  logger: Logger
  fetch?: (url: string) => Promise<HttpResponseLike>
  /** Enables the `generate_text` tool. */
  model?: ChatCompletionOptions
}

const dataSchema = z.record(z.string())

/**
 * Capability server of the example deployment: exposes a small HTTP data API
 * as resources and tools, plus a prompt that asks the model to summarize it.
 */
export function createSampleServer(options: SampleServerOptions): McpServer {
  const fetchImpl: (url: string) => Promise<HttpResponseLike> = options.fetch ?? fetch
  const baseUrl = options.apiBaseUrl.replace(/\/+$/, '')
  const { logger } = options

  const server = new McpServer({ name: 'sample-capability-server', version: '0.1.0' })

  async function callApi(path: string): Promise<string> {
    const res = await fetchImpl(`${baseUrl}${path}`)
    const body = await res.text()
    if (!res.ok) {
      logger.warn('sample.api_failed', { path, status: res.status })
      throw new Error(`API request to ${path} failed with HTTP ${res.status}`)
    }
    return body
  }

  async function getData(): Promise<Record<string, string>> {
    const parsed = dataSchema.safeParse(tryParseJson(await callApi('/get_data')))
    if (!parsed.success) throw new Error('API /get_data returned an unexpected shape')
    return parsed.data
  }

  async function getField(key: string): Promise<string> {
    const value = (await getData())[key]
    if (value === undefined) throw new Error(`No data field '${key}'`)
    return value
  }

  server.registerResource(
    'api_test',
    'api://test',
    { description: 'Call the test endpoint of the data API', mimeType: 'application/json' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'application/json', text: await callApi('/test') }]
    })
  )

  server.registerResource(
    'api_get_data',
    'api://get_data',
    { description: 'Call the get data endpoint of the data API', mimeType: 'application/json' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'application/json', text: await callApi('/get_data') }]
    })
  )

  server.registerResource(
    'api_data_field',
    new ResourceTemplate('api://data/{key}', { list: undefined }),
    { description: 'One labeled value from the data API', mimeType: 'text/plain' },
    async (uri, variables) => {
      const key = Array.isArray(variables.key) ? variables.key.join(',') : variables.key
      return { contents: [{ uri: uri.href, mimeType: 'text/plain', text: await getField(key) }] }
    }
  )

  server.registerPrompt(
    'summarize_data',
    {
      description: 'Ask the model to fetch and summarize the data API contents',
      argsSchema: { topic: z.string().describe('What the summary should focus on') }
    },
    ({ topic }) => ({
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text: `Call the get_data tool, then summarize the returned values with a focus on ${topic}.`
          }
        }
      ]
    })
  )

  server.registerTool(
    'get_data',
    { description: 'Fetch every labeled value from the data API as a JSON object' },
    async () => ({ content: [{ type: 'text', text: JSON.stringify(await getData()) }] })
  )

  server.registerTool(
    'get_data_field',
    {
      description: 'Fetch one labeled value from the data API',
      inputSchema: { key: z.string().describe('Label of the value, for example A') }
    },
    async ({ key }) => ({ content: [{ type: 'text', text: await getField(key) }] })
  )

  const model = options.model
  if (model) {
    server.registerTool(
      'generate_text',
      {
        description: 'Generate a response using the local language model',
        inputSchema: { prompt: z.string().describe('The input prompt for the model') }
      },
      async ({ prompt }) => {
        try {
          const text = await requestChatCompletion(model, [{ role: 'user', content: prompt }])
          return { content: [{ type: 'text', text }] }
        } catch (error) {
          logger.error('sample.generate_failed', { error: errorMessage(error) })
          return { content: [{ type: 'text', text: errorMessage(error) }], isError: true }
        }
      }
    )
  }

  return server
}

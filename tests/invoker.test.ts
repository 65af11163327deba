import { describe, expect, it } from 'vitest'

import { ChatbotError } from '../src/core/errors.js'
import { CapabilityInvoker, base64Size, coerceToolArguments } from '../src/core/invoker.js'
import { CapabilityRegistry } from '../src/core/registry.js'
import type { CapabilityDescriptor } from '../src/core/types.js'
import { FakeSession, type FakeSessionInit, arg, makeLogger, prompt, resource, tool } from './helpers/fakes.js'

const dataField: CapabilityDescriptor = {
  name: 'api_data_field',
  kind: 'resource',
  description: 'One value',
  argumentSchema: [arg('key')],
  server: 'test',
  resource: { kind: 'template', uriTemplate: 'api://data/{key}' }
}

function setup(init: FakeSessionInit, descriptors: CapabilityDescriptor[]) {
  const session = new FakeSession('test', init)
  const logger = makeLogger()
  const invoker = new CapabilityInvoker(
    new CapabilityRegistry(descriptors),
    new Map([['test', session]]),
    logger
  )
  return { session, logger, invoker }
}

describe('CapabilityInvoker resources', () => {
  it('decodes a JSON object payload', async () => {
    const { session, invoker } = setup(
      {
        readResource: async (uri) => [
          { uri, mimeType: 'application/json', text: '{"A":"Data 1","B":"Data 2"}' }
        ]
      },
      [resource('api_get_data', 'api://get_data')]
    )

    const result = await invoker.invoke('resource', 'api_get_data', {})

    expect(result).toEqual({ ok: true, value: { A: 'Data 1', B: 'Data 2' } })
    expect(session.readResource).toHaveBeenCalledWith('api://get_data')
  })

  it('expands a URI template with the bound arguments', async () => {
    const { session, invoker } = setup(
      { readResource: async (uri) => [{ uri, text: 'Data 1' }] },
      [dataField]
    )

    const result = await invoker.invoke('resource', 'api_data_field', { key: 'A' })

    expect(result).toEqual({ ok: true, value: 'Data 1' })
    expect(session.readResource).toHaveBeenCalledWith('api://data/A')
  })

  it('returns several contents as an array', async () => {
    const { invoker } = setup(
      {
        readResource: async () => [
          { uri: 'api://a', text: 'first' },
          { uri: 'api://b', text: '[1,2]' }
        ]
      },
      [resource('pair', 'api://pair')]
    )

    expect(await invoker.invoke('resource', 'pair', {})).toEqual({ ok: true, value: ['first', [1, 2]] })
  })

  it('reports server failures as RemoteError', async () => {
    const { invoker, logger } = setup(
      {
        readResource: async () => {
          throw new ChatbotError('RemoteError', 'API request to /get_data failed with HTTP 500')
        }
      },
      [resource('api_get_data', 'api://get_data')]
    )

    const result = await invoker.invoke('resource', 'api_get_data', {})

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'RemoteError',
        message: 'API request to /get_data failed with HTTP 500',
        details: {}
      }
    })
    expect(logger.warn).toHaveBeenCalledWith('invoker.failed', {
      kind: 'resource',
      name: 'api_get_data',
      code: 'RemoteError',
      message: 'API request to /get_data failed with HTTP 500'
    })
  })

  it('treats unexpected exceptions as transport failures', async () => {
    const { invoker } = setup(
      {
        readResource: async () => {
          throw new Error('Not connected')
        }
      },
      [resource('api_test', 'api://test')]
    )

    const result = await invoker.invoke('resource', 'api_test', {})

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('TransportError')
    expect(result.error.message).toBe('Not connected')
  })

  it('returns NotFound for an unregistered name', async () => {
    const { invoker } = setup({}, [])

    const result = await invoker.invoke('resource', 'missing', {})

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('NotFound')
  })
})

describe('CapabilityInvoker prompts', () => {
  it('joins rendered messages into one text', async () => {
    const { session, invoker } = setup(
      {
        getPrompt: async () => [
          { role: 'user', text: 'Summarize the data.' },
          { role: 'assistant', text: 'Focus on sales.' }
        ]
      },
      [prompt('summarize_data', [arg('topic')])]
    )

    const result = await invoker.invoke('prompt', 'summarize_data', { topic: 'sales' })

    expect(result).toEqual({ ok: true, value: 'Summarize the data.\n\nFocus on sales.' })
    expect(session.getPrompt).toHaveBeenCalledWith('summarize_data', { topic: 'sales' })
  })
})

describe('CapabilityInvoker tools', () => {
  const calc = tool('calc', [
    arg('count', true, 'integer'),
    arg('flag', false, 'boolean'),
    arg('tags', false, 'array'),
    arg('label')
  ])

  it('coerces arguments to the declared types', async () => {
    const { session, invoker } = setup(
      { callTool: async () => ({ texts: ['42'], isError: false }) },
      [calc]
    )

    const result = await invoker.invoke('tool', 'calc', {
      count: '3',
      flag: 'true',
      tags: '["a"]',
      label: 'x'
    })

    expect(result).toEqual({ ok: true, value: '42' })
    expect(session.callTool).toHaveBeenCalledWith('calc', {
      count: 3,
      flag: true,
      tags: ['a'],
      label: 'x'
    })
  })

  it('fails with ToolError when a value cannot be coerced', async () => {
    const { session, invoker } = setup({}, [calc])

    const result = await invoker.invoke('tool', 'calc', { count: 'abc' })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('ToolError')
    expect(result.error.message).toBe("Argument 'count' must be integer, got 'abc'")
    expect(session.callTool).not.toHaveBeenCalled()
  })

  it('maps an error result to ToolError', async () => {
    const { invoker } = setup(
      { callTool: async () => ({ texts: ["No data field 'Z'"], isError: true }) },
      [tool('get_data_field', [arg('key')])]
    )

    const result = await invoker.invoke('tool', 'get_data_field', { key: 'Z' })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('ToolError')
    expect(result.error.message).toBe("No data field 'Z'")
  })

  it('prefers structured content over text', async () => {
    const { invoker } = setup(
      {
        callTool: async () => ({ texts: ['ignored'], structured: { total: 3 }, isError: false })
      },
      [tool('count')]
    )

    expect(await invoker.invoke('tool', 'count', {})).toEqual({ ok: true, value: { total: 3 } })
  })
})

describe('coerceToolArguments', () => {
  it('leaves union types that include string untouched', () => {
    expect(coerceToolArguments([arg('id', true, 'string|integer')], { id: '7' })).toEqual({ id: '7' })
  })

  it('accepts null for nullable parameters', () => {
    expect(coerceToolArguments([arg('limit', false, 'integer|null')], { limit: 'null' })).toEqual({
      limit: null
    })
  })
})

describe('base64Size', () => {
  it('does not count padding', () => {
    expect(base64Size('YQ==')).toBe(1)
    expect(base64Size('YWI=')).toBe(2)
    expect(base64Size('YWJj')).toBe(3)
    expect(base64Size('')).toBe(0)
  })
})

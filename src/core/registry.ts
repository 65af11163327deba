import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import type { CapabilitySession } from './capability-session.js'
import { chatError, fail, ok } from './errors.js'
import type { ArgumentSpec, CapabilityDescriptor, CapabilityKind, Logger, Result } from './types.js'

const KINDS: readonly CapabilityKind[] = ['resource', 'prompt', 'tool']

const rawResourceSchema = z.object({
  name: z.string().min(1),
  uri: z.string().min(1),
  description: z.string().optional()
})

const rawResourceTemplateSchema = z.object({
  name: z.string().min(1),
  uriTemplate: z.string().min(1),
  description: z.string().optional()
})

const rawPromptSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  arguments: z
    .array(
      z.object({
        name: z.string().min(1),
        description: z.string().optional(),
        required: z.boolean().optional()
      })
    )
    .optional()
})

const jsonSchemaPropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional()
  })
  .passthrough()

const rawToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.object({
    type: z.literal('object'),
    properties: z.record(jsonSchemaPropertySchema).optional(),
    required: z.array(z.string()).optional()
  })
})

const TEMPLATE_EXPRESSION = /\{([+#./;?&]?)([^}]+)\}/g

/**
 * Lists the variables of an RFC 6570 URI template. Query-style expansions
 * (`{?a}`, `{&b}`) are optional, every other variable is required.
 */
export function templateVariables(uriTemplate: string): ArgumentSpec[] {
  const specs: ArgumentSpec[] = []
  for (const match of uriTemplate.matchAll(TEMPLATE_EXPRESSION)) {
    const operator = match[1] ?? ''
    const optional = operator === '?' || operator === '&'
    for (const variable of (match[2] ?? '').split(',')) {
      const name = variable.trim().replace(/(\*|:\d+)$/, '')
      if (name && !specs.some((spec) => spec.name === name)) {
        specs.push({ name, typeHint: 'string', required: !optional })
      }
    }
  }
  return specs
}

function typeHintOf(type: string | string[] | undefined): string {
  if (type === undefined) return 'string'
  return Array.isArray(type) ? type.join('|') : type
}

function freeze(descriptor: CapabilityDescriptor): CapabilityDescriptor {
  Object.freeze(descriptor.argumentSchema)
  return Object.freeze(descriptor)
}

export function normalizeResource(raw: unknown, server: string): CapabilityDescriptor | null {
  const parsed = rawResourceSchema.safeParse(raw)
  if (!parsed.success) return null
  return freeze({
    name: parsed.data.name,
    kind: 'resource',
    description: parsed.data.description ?? '',
    argumentSchema: [],
    server,
    resource: { kind: 'static', uri: parsed.data.uri }
  })
}

export function normalizeResourceTemplate(raw: unknown, server: string): CapabilityDescriptor | null {
  const parsed = rawResourceTemplateSchema.safeParse(raw)
  if (!parsed.success) return null
  return freeze({
    name: parsed.data.name,
    kind: 'resource',
    description: parsed.data.description ?? '',
    argumentSchema: templateVariables(parsed.data.uriTemplate),
    server,
    resource: { kind: 'template', uriTemplate: parsed.data.uriTemplate }
  })
}

export function normalizePrompt(raw: unknown, server: string): CapabilityDescriptor | null {
  const parsed = rawPromptSchema.safeParse(raw)
  if (!parsed.success) return null
  return freeze({
    name: parsed.data.name,
    kind: 'prompt',
    description: parsed.data.description ?? '',
    argumentSchema: (parsed.data.arguments ?? []).map((arg) => ({
      name: arg.name,
      typeHint: 'string',
      required: arg.required ?? false,
      description: arg.description
    })),
    server
  })
}

export function normalizeTool(raw: unknown, server: string): CapabilityDescriptor | null {
  const parsed = rawToolSchema.safeParse(raw)
  if (!parsed.success) return null
  const required = new Set(parsed.data.inputSchema.required ?? [])
  const properties = parsed.data.inputSchema.properties ?? {}
  return freeze({
    name: parsed.data.name,
    kind: 'tool',
    description: parsed.data.description ?? '',
    argumentSchema: Object.entries(properties).map(([name, property]) => ({
      name,
      typeHint: typeHintOf(property.type),
      required: required.has(name),
      description: property.description
    })),
    server
  })
}

/** Servers with static resources often have no `resources/templates/list` handler. */
async function listTemplates(session: CapabilitySession, logger: Logger): Promise<unknown[]> {
  try {
    return await session.listResourceTemplates()
  } catch (error) {
    if (!(error instanceof McpError) || error.code !== ErrorCode.MethodNotFound) throw error
    logger.warn('registry.kind_unsupported', { server: session.name, kind: 'resource_template' })
    return []
  }
}

function nameOf(raw: unknown): unknown {
  return typeof raw === 'object' && raw !== null && 'name' in raw ? raw.name : undefined
}

/**
 * Read-only catalog of everything the connected servers advertise, keyed by
 * kind and name.
 */
export class CapabilityRegistry {
  private readonly entries = new Map<CapabilityKind, Map<string, CapabilityDescriptor>>(
    KINDS.map((kind) => [kind, new Map()])
  )

  constructor(descriptors: Iterable<CapabilityDescriptor>, logger?: Logger) {
    for (const descriptor of descriptors) {
      const byName = this.byKind(descriptor.kind)
      const existing = byName.get(descriptor.name)
      if (existing) {
        logger?.warn('registry.duplicate_name', {
          kind: descriptor.kind,
          name: descriptor.name,
          kept: existing.server,
          ignored: descriptor.server
        })
        continue
      }
      byName.set(descriptor.name, descriptor)
    }
  }

  /**
   * Queries every session for its catalog. Rejects if an advertised kind
   * cannot be listed; the chatbot has nothing to offer without it. A missing
   * templates handler only drops the templates.
   */
  static async populate(
    sessions: ReadonlyMap<string, CapabilitySession>,
    logger: Logger
  ): Promise<CapabilityRegistry> {
    const descriptors: CapabilityDescriptor[] = []

    const collect = (
      items: unknown[],
      normalize: (raw: unknown, server: string) => CapabilityDescriptor | null,
      kind: CapabilityKind,
      server: string
    ): void => {
      for (const raw of items) {
        const descriptor = normalize(raw, server)
        if (descriptor) {
          descriptors.push(descriptor)
        } else {
          logger.warn('registry.descriptor_rejected', { server, kind, name: nameOf(raw) })
        }
      }
    }

    for (const session of sessions.values()) {
      const flags = session.capabilities()
      const server = session.name

      if (flags.resources) {
        collect(await session.listResources(), normalizeResource, 'resource', server)
        collect(await listTemplates(session, logger), normalizeResourceTemplate, 'resource', server)
      } else {
        logger.warn('registry.kind_unsupported', { server, kind: 'resource' })
      }

      if (flags.prompts) {
        collect(await session.listPrompts(), normalizePrompt, 'prompt', server)
      } else {
        logger.warn('registry.kind_unsupported', { server, kind: 'prompt' })
      }

      if (flags.tools) {
        collect(await session.listTools(), normalizeTool, 'tool', server)
      } else {
        logger.warn('registry.kind_unsupported', { server, kind: 'tool' })
      }
    }

    const registry = new CapabilityRegistry(descriptors, logger)
    logger.info('registry.populated', {
      resources: registry.list('resource').length,
      prompts: registry.list('prompt').length,
      tools: registry.list('tool').length
    })
    return registry
  }

  list(kind: CapabilityKind): readonly CapabilityDescriptor[] {
    return [...this.byKind(kind).values()]
  }

  lookup(kind: CapabilityKind, name: string): Result<CapabilityDescriptor> {
    const descriptor = this.byKind(kind).get(name)
    if (!descriptor) {
      return fail(chatError('NotFound', `${capitalize(kind)} '${name}' not found.`, { kind, name }))
    }
    return ok(descriptor)
  }

  private byKind(kind: CapabilityKind): Map<string, CapabilityDescriptor> {
    let byName = this.entries.get(kind)
    if (!byName) {
      byName = new Map()
      this.entries.set(kind, byName)
    }
    return byName
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

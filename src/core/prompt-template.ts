import type { ArgumentSpec, CapabilityDescriptor, ConversationTurn } from './types.js'

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant with access to the tools listed below.\n' +
  'To call a tool, reply with only a JSON object and nothing else:\n' +
  '{"tool": "<tool name>", "arguments": {"<argument>": "<value>"}}\n' +
  'Tool results come back as messages starting with "Tool <name> returned:".\n' +
  'When you can answer without a tool, reply in plain text.\n\n' +
  'Available tools:\n{{tools}}'

/** Compact argument hint, `?` marking optional parameters: `key, limit?`. */
export function describeArguments(schema: readonly ArgumentSpec[]): string {
  return schema.map((param) => (param.required ? param.name : `${param.name}?`)).join(', ')
}

function describeTool(tool: CapabilityDescriptor): string {
  const params = tool.argumentSchema
    .map((param) => `${param.name}${param.required ? '' : '?'}: ${param.typeHint}`)
    .join(', ')
  return `- ${tool.name}(${params})${tool.description ? `: ${tool.description}` : ''}`
}

/**
 * Fills the system prompt template with the tool catalog.
 */
export function renderSystemPrompt(template: string, tools: readonly CapabilityDescriptor[]): string {
  const catalog = tools.length > 0 ? tools.map(describeTool).join('\n') : '(none)'
  return template.replaceAll('{{tools}}', catalog)
}

/** Text a tool turn shows the model. */
export function renderToolTurn(turn: Extract<ConversationTurn, { role: 'tool' }>): string {
  return `Tool ${turn.toolName} returned:\n${turn.content}`
}

/**
 * Flattens a system prompt and conversation into one prompt string, for
 * models that only take a single text input.
 */
export function renderTranscript(systemPrompt: string, turns: readonly ConversationTurn[]): string {
  const lines = [systemPrompt, '']
  for (const turn of turns) {
    if (turn.role === 'user') lines.push(`User: ${turn.content}`)
    else if (turn.role === 'model') lines.push(`Assistant: ${turn.content}`)
    else lines.push(renderToolTurn(turn))
  }
  lines.push('Assistant:')
  return lines.join('\n')
}

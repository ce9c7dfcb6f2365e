import { z } from "zod"
import { GmailError } from "./errors.js"
import type { GmailContext } from "./gmail/index.js"

export type ToolDefinition = {
  name: string
  description: string
  schema: z.ZodTypeAny
  invoke: (ctx: GmailContext, params: unknown) => Promise<unknown>
}

export type ResourceDefinition = {
  name: string
  /** Path segment after the scheme, e.g. `message` in mail://message/{id} */
  path: string
  uri: string
  description: string
  argument?: string
  read: (ctx: GmailContext, argument: string) => Promise<unknown>
}

export type ParsedResourceUri = {
  path: string
  argument?: string
}

export const RESOURCE_SCHEME = 'mail'

export const formatIssues = (error: z.ZodError) =>
  error.issues.map(issue => issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message).join('; ')

export const defineTool = <Args, Result>(tool: {
  name: string
  description: string
  schema: z.ZodType<Args, z.ZodTypeDef, unknown>
  run: (ctx: GmailContext, args: Args) => Promise<Result>
}): ToolDefinition => ({
  name: tool.name,
  description: tool.description,
  schema: tool.schema,
  invoke: async (ctx, params) => {
    const parsed = tool.schema.safeParse(params ?? {})
    if (!parsed.success) throw new GmailError('Invalid', `Invalid parameters for ${tool.name}: ${formatIssues(parsed.error)}`)
    return tool.run(ctx, parsed.data)
  }
})

export const callTool = async (tools: ToolDefinition[], ctx: GmailContext, name: string, params: unknown) => {
  const tool = tools.find(t => t.name === name)
  if (!tool) throw new GmailError('NotSupported', `Unknown tool: ${name}`)
  return tool.invoke(ctx, params)
}

/**
 * Splits `mail://<path>[/<argument>]`. Everything after the first path
 * segment is the argument, URI-decoded, so search queries may contain `/`.
 */
export const parseResourceUri = (uri: string): ParsedResourceUri => {
  const match = /^([a-z][a-z0-9+.-]*):\/\/([^/?#]+)(?:\/(.*))?$/i.exec(uri.trim())
  if (!match) throw new GmailError('Invalid', `Malformed resource URI: ${uri}`)

  const [, scheme, path, rawArgument] = match
  if (scheme.toLowerCase() !== RESOURCE_SCHEME) throw new GmailError('NotSupported', `Unsupported resource scheme: ${scheme}`)
  if (!rawArgument) return { path }

  try {
    return { path, argument: decodeURIComponent(rawArgument) }
  } catch (error) {
    throw new GmailError('Invalid', `Malformed resource URI: ${uri}`, { cause: error })
  }
}

export const readResource = async (resources: ResourceDefinition[], ctx: GmailContext, uri: string) => {
  const { path, argument } = parseResourceUri(uri)

  const resource = resources.find(r => r.path === path)
  if (!resource) throw new GmailError('NotSupported', `Unknown resource: ${uri}`)

  if (resource.argument && !argument) throw new GmailError('Invalid', `Resource ${resource.uri} is missing its ${resource.argument}`)
  if (!resource.argument && argument) throw new GmailError('Invalid', `Resource ${resource.uri} takes no argument`)

  return resource.read(ctx, argument ?? '')
}

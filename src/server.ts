import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js"
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type ReadResourceResult
} from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import { zodToJsonSchema } from "zod-to-json-schema"
import { GmailError, toErrorPayload, type ErrorKind } from "./errors.js"
import type { GmailContext } from "./gmail/index.js"
import { logger } from "./logger.js"
import { getPrompt, PROMPTS, type PromptDefinition } from "./prompts.js"
import { callTool, readResource, type ResourceDefinition, type ToolDefinition } from "./registry.js"
import { RESOURCES } from "./resources.js"
import { TOOLS } from "./tools.js"

type ServerOptions = {
  context: GmailContext
  tools?: ToolDefinition[]
  resources?: ResourceDefinition[]
  prompts?: PromptDefinition[]
}

const ObjectJsonSchema = z.object({
  type: z.literal('object'),
  properties: z.record(z.unknown()).optional(),
  required: z.array(z.string()).optional()
}).passthrough()

const formatResponse = (response: unknown): CallToolResult => ({ content: [{ type: "text", text: JSON.stringify(response) }] })

const formatError = (error: unknown): CallToolResult => ({ ...formatResponse(toErrorPayload(error)), isError: true })

const toInputSchema = (tool: ToolDefinition) => {
  const parsed = ObjectJsonSchema.safeParse(zodToJsonSchema(tool.schema, { $refStrategy: 'none' }))
  if (!parsed.success) throw new Error(`Tool ${tool.name} must take an object of named parameters`)
  return parsed.data
}

const MCP_ERROR_CODES: Partial<Record<ErrorKind, ErrorCode>> = {
  Invalid: ErrorCode.InvalidParams,
  NotSupported: ErrorCode.InvalidRequest
}

const toMcpError = (error: unknown) => {
  const { error: { kind, message } } = toErrorPayload(error)
  return new McpError(MCP_ERROR_CODES[kind] ?? ErrorCode.InternalError, message, { kind })
}

export const createServer = ({ context, tools = TOOLS, resources = RESOURCES, prompts = PROMPTS }: ServerOptions) => {
  const server = new McpServer(
    { name: "Gmail Server", version: "1.0.0" },
    { capabilities: { tools: {}, prompts: {} } }
  )

  server.server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool)
    }))
  }))

  server.server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: params } = request.params
    try {
      return formatResponse(await callTool(tools, context, name, params))
    } catch (error) {
      logger('error', `Tool ${name} failed`, { error: error instanceof Error ? error.message : String(error) })
      return formatError(error)
    }
  })

  const read = async (uri: URL): Promise<ReadResourceResult> => {
    try {
      const data = await readResource(resources, context, uri.href)
      return { contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(data) }] }
    } catch (error) {
      logger('error', `Reading ${uri.href} failed`, { error: error instanceof Error ? error.message : String(error) })
      throw error instanceof GmailError ? toMcpError(error) : error
    }
  }

  for (const resource of resources) {
    const metadata = { description: resource.description, mimeType: "application/json" }
    if (resource.argument) {
      server.resource(resource.name, new ResourceTemplate(resource.uri, { list: undefined }), metadata, uri => read(uri))
    } else {
      server.resource(resource.name, resource.uri, metadata, uri => read(uri))
    }
  }

  server.server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: prompts.map(({ name, description, arguments: args }) => ({ name, description, arguments: args }))
  }))

  server.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params
    try {
      return getPrompt(prompts, name, args)
    } catch (error) {
      logger('error', `Prompt ${name} failed`, { error: error instanceof Error ? error.message : String(error) })
      throw error instanceof GmailError ? toMcpError(error) : error
    }
  })

  return server
}

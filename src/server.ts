// MCP session layer: maps protocol requests onto the dispatcher

// External packages
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';

// Local modules
import type { ServerConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { logger } from './logger.js';
import { isRequiredField, toJsonSchema } from './schema.js';
import type { OperationSummary, PromptSummary } from './types.js';

export interface PromptArgument {
  name: string;
  description: string;
  required: boolean;
}

export function toToolDefinition(operation: OperationSummary): Tool {
  return {
    name: operation.name,
    description: operation.description,
    inputSchema: toJsonSchema(operation.parameters)
  };
}

export function toPromptArguments(prompt: PromptSummary): PromptArgument[] {
  return prompt.parameters.map((fieldSchema) => ({
    name: fieldSchema.name,
    description: fieldSchema.description,
    required: isRequiredField(fieldSchema)
  }));
}

/**
 * Creates an MCP server whose six list/call/read/get handlers delegate to
 * the dispatcher. Failures travel back as envelopes inside ordinary results
 * (never as protocol errors), so clients tell success from failure by the
 * envelope's `success` flag.
 */
export function createCapabilityServer(dispatcher: Dispatcher, config: ServerConfig): Server {
  const server = new Server(
    {
      name: config.server.name,
      version: config.server.version
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {}
      }
    }
  );

  // List tools handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: dispatcher.listOperations().map(toToolDefinition)
    };
  });

  // Call tool handler
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    logger.debug(`Calling tool ${name}`, 'handleToolCall');

    const envelope = await dispatcher.callOperation(name, args ?? {}, { signal: extra.signal });

    return {
      content: [{ type: 'text' as const, text: JSON.stringify(envelope) }],
      isError: !envelope.success
    };
  });

  // List resources handler
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: dispatcher.listResources()
    };
  });

  // Read resource handler
  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    const { uri } = request.params;
    const resource = dispatcher.listResources().find((candidate) => candidate.uri === uri);
    const envelope = await dispatcher.readResource(uri, { signal: extra.signal });

    if (envelope.success) {
      return {
        contents: [{ uri, mimeType: resource?.mimeType ?? 'text/plain', text: envelope.payload }],
        _meta: { success: true }
      };
    }

    return {
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(envelope) }],
      _meta: { success: false, error: envelope.error }
    };
  });

  // List prompts handler
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: dispatcher.listPrompts().map((prompt) => ({
        name: prompt.name,
        description: prompt.description,
        arguments: toPromptArguments(prompt)
      }))
    };
  });

  // Get prompt handler
  server.setRequestHandler(GetPromptRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const envelope = await dispatcher.renderPrompt(name, args ?? {}, { signal: extra.signal });

    if (!envelope.success) {
      return {
        messages: [],
        _meta: { success: false, error: envelope.error }
      };
    }

    return {
      description: dispatcher.listPrompts().find((prompt) => prompt.name === name)?.description,
      messages: envelope.payload.map((message) => ({
        role: message.role,
        content: { type: 'text' as const, text: message.content }
      })),
      _meta: { success: true }
    };
  });

  server.onerror = (error) => {
    logger.error('MCP server error', 'createCapabilityServer', error);
  };

  return server;
}

// Research operations exposed as MCP tools

// Node.js built-ins
import { existsSync, statSync } from 'fs';
import { resolve } from 'path';

// External packages
import { z } from 'zod';

// Local modules
import { CREDENTIAL_NAMES } from '../config.js';
import { HandlerFailure } from '../errors.js';
import { countWords, extractCitations } from '../helpers.js';
import {
  REPORT_SOURCES,
  REPORT_TYPES,
  type McpServerConfig,
  type ResearchBackend,
  type ResearchRequest
} from '../research-backend.js';
import { field } from '../schema.js';
import type { HandlerContext, OperationDescriptor, OperationHandler, WireValue } from '../types.js';
import type { ValidatedInput } from '../validated-input.js';

const McpServerConfigSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({})
});

const McpServerConfigListSchema = z.array(McpServerConfigSchema);

const queryField = field.string('query', {
  description: 'The research question or topic to investigate',
  required: true
});

const reportTypeField = field.enum('report_type', REPORT_TYPES, {
  description: 'Type of report to generate (research_report, resource_report, outline_report)',
  default: 'research_report'
});

const mcpConfigItem = { kind: 'object' } as const;

export function parseMcpConfigs(raw: unknown[] | undefined): McpServerConfig[] {
  if (raw === undefined) return [];
  const parsed = McpServerConfigListSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `mcp_configs[${issue.path.join('.')}]: ${issue.message}`)
      .join('; ');
    throw new HandlerFailure(`Invalid MCP configuration: ${details}`, 'invalid mcp config');
  }
  return parsed.data;
}

// Local and hybrid research need a readable documents directory.
export function resolveDocPath(requested: string | undefined, context: HandlerContext): string {
  const docPath = requested ?? context.config.research.docPath;
  if (!docPath) {
    throw new HandlerFailure('A documents directory is required: pass doc_path or set DOC_PATH', 'missing document path');
  }
  const absolute = resolve(docPath);
  if (!existsSync(absolute) || !statSync(absolute).isDirectory()) {
    throw new HandlerFailure(`Documents directory does not exist: ${absolute}`, 'invalid document path');
  }
  return absolute;
}

export function toResearchPayload(
  request: ResearchRequest,
  report: string,
  extraMetadata: { [key: string]: WireValue } = {}
): { [key: string]: WireValue } {
  const citations = extractCitations(report);
  const metadata: { [key: string]: WireValue } = {
    query: request.query,
    report_type: request.reportType,
    report_source: request.reportSource,
    max_iterations: request.maxIterations,
    retriever: request.retriever,
    timestamp: new Date().toISOString(),
    total_sources: citations.length,
    word_count: countWords(report),
    ...extraMetadata
  };
  if (request.docPath) {
    metadata.doc_path = request.docPath;
  }

  return {
    query: request.query,
    report,
    citations,
    metadata
  };
}

async function runResearch(
  backend: ResearchBackend,
  request: ResearchRequest,
  context: HandlerContext,
  extraMetadata?: { [key: string]: WireValue }
): Promise<WireValue> {
  const { report } = await backend.run(request, context);
  return toResearchPayload(request, report, extraMetadata);
}

function conductResearch(backend: ResearchBackend): OperationHandler {
  return async (input: ValidatedInput, context: HandlerContext): Promise<WireValue> => {
    const reportSource = input.enumValue('report_source', REPORT_SOURCES);
    const request: ResearchRequest = {
      query: input.string('query'),
      reportType: input.enumValue('report_type', REPORT_TYPES),
      reportSource,
      maxIterations: input.number('max_iterations'),
      retriever: input.optionalString('retriever') ?? context.config.research.retriever,
      mcpConfigs: parseMcpConfigs(input.optionalArray('mcp_configs'))
    };
    if (reportSource !== 'web') {
      request.docPath = resolveDocPath(input.optionalString('doc_path'), context);
    }
    return runResearch(backend, request, context);
  };
}

export const RESEARCH_CAPABILITIES = {
  supported_report_types: [...REPORT_TYPES],
  supported_sources: [...REPORT_SOURCES],
  supported_document_formats: ['PDF', 'TXT', 'CSV', 'Markdown', 'JSON', 'HTML'],
  available_retrievers: ['tavily', 'mcp', 'local'],
  deep_research_available: true,
  mcp_integration_available: true,
  local_document_support: true,
  citation_support: true,
  configuration_options: {
    max_iterations: '1-10',
    depth: '1-5 (for deep research)',
    breadth: '1-10 (for deep research)',
    report_types: [...REPORT_TYPES],
    sources: [...REPORT_SOURCES]
  }
} satisfies { [key: string]: WireValue };

export function createResearchOperations(backend: ResearchBackend): OperationDescriptor[] {
  return [
    {
      kind: 'operation',
      name: 'conduct_research',
      description: 'Conduct comprehensive research on a query, gathering information from web sources, local documents, or both, and generate a detailed report with citations.',
      parameters: [
        queryField,
        reportTypeField,
        field.enum('report_source', REPORT_SOURCES, {
          description: 'Source for research: web search, local documents, or hybrid',
          default: 'web'
        }),
        field.number('max_iterations', {
          description: 'Maximum number of research iterations (1-10)',
          integer: true,
          min: 1,
          max: 10,
          default: 3
        }),
        field.string('doc_path', {
          description: 'Path to local documents directory (required for local/hybrid research unless DOC_PATH is set)'
        }),
        field.string('retriever', {
          description: 'Retriever to use: tavily, mcp, local, or a comma-separated list (defaults to RESEARCH_RETRIEVER)'
        }),
        field.array('mcp_configs', mcpConfigItem, {
          description: 'MCP server configurations ({ name, command, args, env }) for hybrid research with external data sources'
        })
      ],
      handler: conductResearch(backend)
    },
    {
      kind: 'operation',
      name: 'research_local_documents',
      description: 'Conduct research using only local documents (PDF, TXT, CSV, Markdown and other text formats) in a directory.',
      parameters: [
        queryField,
        field.string('doc_path', {
          description: 'Path to directory containing documents',
          required: true
        }),
        reportTypeField
      ],
      handler: async (input, context) => {
        const request: ResearchRequest = {
          query: input.string('query'),
          reportType: input.enumValue('report_type', REPORT_TYPES),
          reportSource: 'local',
          maxIterations: 3,
          retriever: 'local',
          docPath: resolveDocPath(input.string('doc_path'), context),
          mcpConfigs: []
        };
        return runResearch(backend, request, context);
      }
    },
    {
      kind: 'operation',
      name: 'deep_research',
      description: 'Conduct deep recursive research with tree-like exploration, diving into subtopics with configurable depth and breadth.',
      parameters: [
        queryField,
        field.number('depth', {
          description: 'Depth of recursive exploration (1-5)',
          integer: true,
          min: 1,
          max: 5,
          default: 3
        }),
        field.number('breadth', {
          description: 'Breadth of subtopics to explore (1-10)',
          integer: true,
          min: 1,
          max: 10,
          default: 5
        }),
        field.number('max_iterations', {
          description: 'Maximum number of research iterations (1-10)',
          integer: true,
          min: 1,
          max: 10,
          default: 5
        })
      ],
      handler: async (input, context) => {
        const depth = input.number('depth');
        const breadth = input.number('breadth');
        const request: ResearchRequest = {
          query: input.string('query'),
          reportType: 'research_report',
          reportSource: 'web',
          maxIterations: input.number('max_iterations'),
          retriever: context.config.research.retriever,
          mcpConfigs: [],
          deep: { depth, breadth }
        };
        return runResearch(backend, request, context, { research_type: 'deep_research', depth, breadth });
      }
    },
    {
      kind: 'operation',
      name: 'hybrid_research_with_mcp',
      description: 'Conduct hybrid research combining web search with MCP data sources such as repositories, databases and custom APIs.',
      parameters: [
        queryField,
        field.array('mcp_configs', mcpConfigItem, {
          description: 'MCP server configurations ({ name, command, args, env }) for external data sources',
          required: true
        }),
        reportTypeField
      ],
      handler: async (input, context) => {
        const request: ResearchRequest = {
          query: input.string('query'),
          reportType: input.enumValue('report_type', REPORT_TYPES),
          reportSource: 'web',
          maxIterations: 3,
          retriever: 'tavily,mcp',
          mcpConfigs: parseMcpConfigs(input.array('mcp_configs'))
        };
        return runResearch(backend, request, context);
      }
    },
    {
      kind: 'operation',
      name: 'get_research_capabilities',
      description: 'Get information about available report types, sources, document formats and configuration options.',
      parameters: [],
      handler: () => RESEARCH_CAPABILITIES
    },
    {
      kind: 'operation',
      name: 'validate_research_setup',
      description: 'Validate that the research CLI is installed and that credentials are configured.',
      parameters: [],
      timeoutMs: 15_000,
      handler: async (_input, context) => {
        const status = await backend.probe(context);
        const setupInstructions: string[] = [];

        if (!status.available) {
          setupInstructions.push(
            `Install the research CLI or point RESEARCH_CLI_PATH at it (currently "${context.config.research.cliPath}")`
          );
        }

        const apiKeysConfigured: { [key: string]: WireValue } = {};
        for (const name of CREDENTIAL_NAMES) {
          const configured = Boolean(context.config.credentials[name]);
          apiKeysConfigured[name] = configured;
          if (!configured) {
            setupInstructions.push(`Set ${name} environment variable for full functionality`);
          }
        }

        const docPath = context.config.research.docPath;
        return {
          research_cli: {
            path: context.config.research.cliPath,
            available: status.available,
            version: status.version ?? null,
            detail: status.detail ?? null
          },
          api_keys_configured: apiKeysConfigured,
          default_doc_path: docPath === undefined ? null : { path: docPath, exists: existsSync(docPath) },
          setup_instructions: setupInstructions
        };
      }
    }
  ];
}

// Documentation and configuration resources

// Node.js built-ins
import { readFile } from 'fs/promises';

// Local modules
import type { ServerConfig } from '../config.js';
import type { ResourceDescriptor } from '../types.js';

// Resolves to <root>/resources from both src/catalog and dist/catalog
export const RESOURCE_DIR = new URL('../../resources/', import.meta.url);

function markdownFile(fileName: string): ResourceDescriptor['producer'] {
  return (context) => readFile(new URL(fileName, RESOURCE_DIR), { encoding: 'utf8', signal: context.signal });
}

export function renderConfigTemplate(config: ServerConfig): string {
  return JSON.stringify({
    research_config: {
      default_report_type: 'research_report',
      default_source: 'web',
      max_iterations: 3,
      retriever: config.research.retriever,
      cli_path: config.research.cliPath,
      timeout_ms: config.research.timeoutMs
    },
    mcp_configs: [
      {
        name: 'github',
        command: 'npx',
        args: ['-y', '@modelcontextprotocol/server-github'],
        env: {
          GITHUB_TOKEN: '${GITHUB_TOKEN}'
        }
      }
    ],
    local_documents: {
      doc_path: config.research.docPath ?? './documents',
      supported_formats: ['pdf', 'txt', 'csv', 'md', 'json', 'html']
    },
    deep_research: {
      default_depth: 3,
      default_breadth: 5,
      max_iterations: 5
    }
  }, null, 2);
}

export function createResearchResources(): ResourceDescriptor[] {
  return [
    {
      kind: 'resource',
      uri: 'research://docs/installation',
      name: 'Installation guide',
      description: 'Installation and setup documentation for the research server',
      mimeType: 'text/markdown',
      producer: markdownFile('installation.md')
    },
    {
      kind: 'resource',
      uri: 'research://docs/examples',
      name: 'Usage examples',
      description: 'Usage examples for the research tools',
      mimeType: 'text/markdown',
      producer: markdownFile('examples.md')
    },
    {
      kind: 'resource',
      uri: 'research://config/template',
      name: 'Configuration template',
      description: 'Configuration template reflecting the server\'s current research settings',
      mimeType: 'application/json',
      producer: (context) => renderConfigTemplate(context.config)
    }
  ];
}

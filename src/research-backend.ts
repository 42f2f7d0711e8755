// Research backend: runs research through an external CLI in print mode

// Node.js built-ins
import { spawn } from 'child_process';
import { platform } from 'os';

// Local modules
import { HandlerFailure } from './errors.js';
import { toError } from './logger.js';
import type { HandlerContext } from './types.js';

export const REPORT_TYPES = ['research_report', 'resource_report', 'outline_report'] as const;
export const REPORT_SOURCES = ['web', 'local', 'hybrid'] as const;

export type ReportType = typeof REPORT_TYPES[number];
export type ReportSource = typeof REPORT_SOURCES[number];

export interface McpServerConfig {
  name: string;
  command: string;
  args: string[];
  env: Record<string, string>;
}

export interface ResearchRequest {
  query: string;
  reportType: ReportType;
  reportSource: ReportSource;
  maxIterations: number;
  retriever: string;
  docPath?: string;
  mcpConfigs: McpServerConfig[];
  // Present for recursive deep research
  deep?: {
    depth: number;
    breadth: number;
  };
}

export interface ResearchReport {
  report: string;
}

export interface BackendStatus {
  available: boolean;
  version?: string;
  detail?: string;
}

export interface ResearchBackend {
  run(request: ResearchRequest, context: HandlerContext): Promise<ResearchReport>;
  probe(context: HandlerContext): Promise<BackendStatus>;
}

const REPORT_INSTRUCTIONS: Record<ReportType, string> = {
  research_report: 'Write a detailed research report in markdown with an introduction, findings organised by subtopic, and a conclusion. Cite every claim with the source URL.',
  resource_report: 'Write an annotated bibliography in markdown: one entry per relevant source with its URL and a short summary of what it contributes.',
  outline_report: 'Write a structured markdown outline of the topic with headings, key points under each heading, and the source URL for each point.'
};

const SOURCE_INSTRUCTIONS: Record<ReportSource, string> = {
  web: 'Use web search and fetch pages to gather information.',
  local: 'Use only the local documents in the provided directory. Do not search the web.',
  hybrid: 'Combine web search with the local documents in the provided directory.'
};

export function allowedToolsFor(request: ResearchRequest): string {
  const tools: string[] = [];
  if (request.reportSource !== 'local') {
    tools.push('WebSearch', 'WebFetch');
  }
  if (request.reportSource !== 'web') {
    tools.push('Read', 'Glob', 'Grep');
  }
  for (const config of request.mcpConfigs) {
    tools.push(`mcp__${config.name}`);
  }
  return tools.join(',');
}

export function buildResearchPrompt(request: ResearchRequest): string {
  const lines = [
    `You are a research assistant. Research the following query thoroughly: "${request.query}"`,
    '',
    SOURCE_INSTRUCTIONS[request.reportSource],
    `Preferred retriever(s): ${request.retriever}.`,
    `Use at most ${request.maxIterations} rounds of searching and reading before writing the report.`
  ];

  if (request.docPath) {
    lines.push(`Local documents directory: ${request.docPath}`);
  }

  if (request.deep) {
    lines.push(
      '',
      `Explore the topic recursively: break it into up to ${request.deep.breadth} subtopics, ` +
      `and follow each subtopic down to ${request.deep.depth} levels of detail before summarising.`
    );
  }

  if (request.mcpConfigs.length > 0) {
    lines.push('', `Also query these connected data sources: ${request.mcpConfigs.map((config) => config.name).join(', ')}.`);
  }

  lines.push('', REPORT_INSTRUCTIONS[request.reportType]);
  return lines.join('\n');
}

export function buildMcpConfigArgument(configs: McpServerConfig[]): string {
  const mcpServers: Record<string, { command: string; args: string[]; env: Record<string, string> }> = {};
  for (const config of configs) {
    mcpServers[config.name] = { command: config.command, args: config.args, env: config.env };
  }
  return JSON.stringify({ mcpServers });
}

export function buildResearchArgs(request: ResearchRequest): string[] {
  const args = [
    '--print',
    '--output-format', 'text',
    '--allowedTools', allowedToolsFor(request),
    '--max-turns', String(request.maxIterations * 10)
  ];
  if (request.docPath && request.reportSource !== 'web') {
    args.push('--add-dir', request.docPath);
  }
  if (request.mcpConfigs.length > 0) {
    args.push('--mcp-config', buildMcpConfigArgument(request.mcpConfigs));
  }
  return args;
}

interface CommandOptions {
  input?: string;
  signal: AbortSignal;
  timeoutMs: number;
}

interface CommandResult {
  stdout: string;
  stderr: string;
}

// Spawns the CLI and collects its output. Every failure is a HandlerFailure
// carrying a cause tag the dispatcher can report.
export function runCommand(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    if (options.signal.aborted) {
      reject(new HandlerFailure('Research run was cancelled before it started', 'cancelled'));
      return;
    }

    const proc = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: process.env,
      shell: platform() === 'win32'
    });

    let stdout = '';
    let stderr = '';
    let isResolved = false;

    const stop = (): void => {
      if (!proc.killed) {
        proc.kill('SIGTERM');
        setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) {
            proc.kill('SIGKILL');
          }
        }, 2000).unref();
      }
    };

    const settle = (error: HandlerFailure | null, result?: CommandResult): void => {
      if (isResolved) return;
      isResolved = true;
      clearTimeout(timeout);
      options.signal.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else if (result) {
        resolve(result);
      }
    };

    const onAbort = (): void => {
      stop();
      settle(new HandlerFailure(`${command} was aborted`, 'cancelled'));
    };
    options.signal.addEventListener('abort', onAbort, { once: true });

    const timeout = setTimeout(() => {
      stop();
      settle(new HandlerFailure(`${command} timed out after ${options.timeoutMs}ms`, 'timeout'));
    }, options.timeoutMs);

    // Decoded as streams so multibyte characters split across chunks survive
    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');

    proc.stdout.on('data', (data: string) => {
      stdout += data;
    });

    proc.stderr.on('data', (data: string) => {
      stderr += data;
    });

    proc.on('close', (code) => {
      if (code !== 0) {
        settle(new HandlerFailure(`${command} exited with code ${code}: ${stderr.trim()}`, 'research command failed'));
        return;
      }
      settle(null, { stdout, stderr });
    });

    proc.on('error', (error) => {
      if ('code' in error && error.code === 'ENOENT') {
        settle(new HandlerFailure(`Research CLI not found: ${command}. Set RESEARCH_CLI_PATH or pass --research-cli-path.`, 'dependency not installed'));
        return;
      }
      settle(new HandlerFailure(`Failed to spawn ${command}: ${error.message}`, 'research command failed'));
    });

    // The child may exit before reading stdin
    proc.stdin.on('error', () => {
      stop();
    });
    if (options.input !== undefined) {
      proc.stdin.write(options.input);
    }
    proc.stdin.end();
  });
}

export class CliResearchBackend implements ResearchBackend {
  async run(request: ResearchRequest, context: HandlerContext): Promise<ResearchReport> {
    const { cliPath, timeoutMs } = context.config.research;
    context.logger.debug(`Running research for "${request.query}" (${request.reportSource})`, 'CliResearchBackend');

    const { stdout } = await runCommand(cliPath, buildResearchArgs(request), {
      input: buildResearchPrompt(request),
      signal: context.signal,
      timeoutMs
    });

    const report = stdout.trim();
    if (!report) {
      throw new HandlerFailure('Research CLI returned an empty report', 'empty report');
    }
    return { report };
  }

  async probe(context: HandlerContext): Promise<BackendStatus> {
    try {
      const { stdout } = await runCommand(context.config.research.cliPath, ['--version'], {
        signal: context.signal,
        timeoutMs: 10_000
      });
      return { available: true, version: stdout.trim() };
    } catch (error) {
      return { available: false, detail: toError(error).message };
    }
  }
}

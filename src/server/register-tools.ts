/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ToolDefinition } from '../tools/shared.js';

import { directoryTools } from '../tools/directory.js';
import { documentTools } from '../tools/documents.js';
import { summaryTools } from '../tools/summaries.js';
import { batchTools } from '../tools/batch.js';
import { healthTools } from '../tools/health.js';

/**
 * All tool modules in registration order. A function rather than a constant
 * because tools/health imports this module.
 */
function allToolModules(): Record<string, ToolDefinition>[] {
  return [directoryTools, documentTools, summaryTools, batchTools, healthTools];
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules define the same tool name
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of allToolModules()) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(
          `Duplicate tool name detected: "${name}". Each tool must have a unique name.`
        );
      }
      registeredToolNames.add(name);
      const registered = server.tool(name, tool.description, tool.inputSchema, tool.handler);
      if (tool.passthroughUnknownKeys) {
        // The sdk wraps the shape in a stripping z.object()
        registered.inputSchema = z.object(tool.inputSchema).passthrough();
      }
      toolCount++;
    }
  }

  return toolCount;
}

/**
 * Get total tool count without registering on a server instance.
 */
export function getToolCount(): number {
  let count = 0;
  for (const toolModule of allToolModules()) {
    count += Object.keys(toolModule).length;
  }
  return count;
}

/**
 * Names of every tool, in registration order
 */
export function getToolNames(): string[] {
  return allToolModules().flatMap((toolModule) => Object.keys(toolModule));
}

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

// Import all tools
import * as getWeather from './get-weather.js';
import * as calculate from './calculate.js';
import * as convertCurrency from './convert-currency.js';
import * as getTimezoneInfo from './get-timezone-info.js';
import * as convertUnits from './convert-units.js';

// Export individual tools for direct access
export { getWeather, calculate, convertCurrency, getTimezoneInfo, convertUnits };

// All tools as an array for filtering
const allTools = [getWeather, calculate, convertCurrency, getTimezoneInfo, convertUnits];

// List of all tool names for reference
export const toolNames = allTools.map((tool) => tool.name);

/**
 * Register the utility tools with the given server.
 * Optionally filter to only register a subset of tools.
 *
 * @param server - The MCP server to register tools with
 * @param filter - Optional array of tool names to include. If not provided, all tools are registered.
 *   Unknown names are ignored.
 * @returns The names of the tools that were registered.
 */
export function registerAllTools(server: McpServer, filter?: readonly string[]): string[] {
  const registered: string[] = [];
  for (const tool of allTools) {
    if (!filter || filter.includes(tool.name)) {
      tool.register(server);
      registered.push(tool.name);
    }
  }
  return registered;
}

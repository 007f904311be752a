import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { HealthService } from '../../application/services/HealthService.js';
import { errorResult, textResult } from './results.js';

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, healthService: HealthService) {
  server.tool(
    'health-check',
    'Check the health of the server and its components (Ollama connectivity, database status, circuit breaker state, title cache)',
    {},
    async () => {
      try {
        const health = await healthService.check();
        return textResult(`# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``);
      } catch (error) {
        return errorResult('checking health', error);
      }
    }
  );
}

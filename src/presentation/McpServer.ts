import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import {
  DatabaseConnection,
  initializeDatabase,
  closeDatabase,
} from '../infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../infrastructure/database/repositories/ConversationRepository.js';
import { OllamaApiClient } from '../infrastructure/http/OllamaApiClient.js';
import { WeatherApiClient } from '../infrastructure/http/WeatherApiClient.js';
import { IcsHolidayCalendar } from '../infrastructure/http/IcsHolidayCalendar.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { AssistantService } from '../application/services/AssistantService.js';
import { CapabilityRegistry } from '../application/services/CapabilityRegistry.js';
import { ConversationService } from '../application/services/ConversationService.js';
import { HealthService } from '../application/services/HealthService.js';
import { TitleCache } from '../application/services/TitleCache.js';
import { ToolLoop } from '../application/services/ToolLoop.js';
import { ReplyTemplate, TitleTemplate } from '../core/templates/index.js';
import { CircuitBreaker, RetryConfig } from '../utils/retry.js';
import { Logger, createLogger, setDebugLogging } from '../utils/logger.js';
import { registerConversationTools } from './tools/ConversationTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

/**
 * Main MCP Server class that wires every component together
 */
export class McpServer {
  private server: BaseMcpServer;
  private conversationService: ConversationService;
  private healthService: HealthService;
  private webServer: WebServer | null = null;
  private dbConnection: DatabaseConnection;
  private log: Logger;

  constructor(private config: Config) {
    setDebugLogging(config.server.debug);
    this.log = createLogger('server');

    this.dbConnection = initializeDatabase(config.database.file);
    const conversationRepo = new ConversationRepository(this.dbConnection.getDatabase());

    const retryConfig: RetryConfig = {
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      multiplier: 2,
      timeoutMs: config.retry.requestTimeoutMs,
    };
    const circuitBreaker = new CircuitBreaker(5, 60000);
    const ollamaClient = new OllamaApiClient(config.ollama.apiUrl, circuitBreaker, retryConfig);

    const registry = new CapabilityRegistry({
      weather: config.weather.apiKey
        ? new WeatherApiClient(config.weather.apiKey, config.weather.baseUrl)
        : undefined,
      holidays: new IcsHolidayCalendar(),
      holidayFeedUrl: config.holidays.calendarUrl,
    });

    const toolLoop = new ToolLoop(ollamaClient, registry, config.ollama.model, {
      maxRounds: config.chat.maxToolRounds,
    });
    const assistant = new AssistantService(
      ollamaClient,
      config.ollama.model,
      toolLoop,
      new TitleTemplate(config.chat.titlePromptVersion),
      new ReplyTemplate()
    );
    const titleCache = new TitleCache(config.chat.titleCacheSize);

    this.conversationService = new ConversationService(conversationRepo, assistant, titleCache, {
      titleModel: assistant.getModel(),
      titlePromptVersion: assistant.getTitlePromptVersion(),
      turnTimeoutMs: config.chat.turnTimeoutMs,
      titleTimeoutMs: config.chat.titleTimeoutMs,
      titleSafetyMarginMs: config.chat.titleSafetyMarginMs,
      onConversationUpdated: (conversation) => this.webServer?.notifyConversationUpdate(conversation),
    });
    this.healthService = new HealthService(ollamaClient, this.dbConnection, titleCache, circuitBreaker);

    if (config.webApi.enabled) {
      this.webServer = new WebServer(this.conversationService, this.healthService, config.webApi.port);
    }

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    registerConversationTools(this.server, this.conversationService, this.log.child('tools'));
    registerHealthCheckTool(this.server, this.healthService);
  }

  /**
   * Print database statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    this.log.info('database_statistics', {
      path: this.dbConnection.getDatabasePath(),
      conversations: stats.totalConversations,
      messages: stats.totalMessages,
      size_kb: Number((stats.databaseSize / 1024).toFixed(2)),
    });
  }

  /**
   * Start the HTTP API (when enabled) and connect the stdio transport
   */
  async start() {
    if (this.webServer) {
      try {
        await this.webServer.start();
      } catch (error) {
        this.log.error('web_api_start_failed', { error });
      }
    }

    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      this.log.warn('stdin_error', { error });
    });
    process.stdout.on('error', (error) => {
      this.log.warn('stdout_error', { error });
    });
    process.stdin.on('end', () => {
      this.log.warn('stdin_ended');
    });

    await this.server.connect(transport);
    this.log.info('mcp_server_running', { transport: 'stdio', name: this.config.server.name });
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    this.log.info('shutting_down');

    if (this.webServer) {
      await this.webServer.stop();
    }
    await this.server.close();
    closeDatabase();
  }
}

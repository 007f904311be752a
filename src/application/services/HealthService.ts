import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { errorMessage } from '../../core/errors.js';
import { CircuitBreaker, CircuitState } from '../../utils/retry.js';
import { TitleCache, TitleCacheStats } from './TitleCache.js';

export type ComponentStatus = 'healthy' | 'error';

export interface ComponentHealth {
  status: ComponentStatus;
  message: string;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    database: ComponentHealth & {
      statistics?: { totalConversations: number; totalMessages: number; databaseSize: number };
    };
    ollama: ComponentHealth & { modelsCount?: number };
    circuitBreaker?: { state: CircuitState; failureCount: number; successCount: number };
    titleCache: TitleCacheStats;
  };
}

export interface DatabaseStatistics {
  getStatistics(): { totalConversations: number; totalMessages: number; databaseSize: number };
}

/**
 * Health of the database, the model server and the title cache
 */
export class HealthService {
  constructor(
    private readonly ollama: IOllamaClient,
    private readonly database: DatabaseStatistics,
    private readonly titleCache: TitleCache,
    private readonly circuitBreaker?: CircuitBreaker
  ) {}

  async check(): Promise<HealthReport> {
    const breaker = this.circuitBreaker?.getStats();
    const report: HealthReport = {
      timestamp: new Date().toISOString(),
      status: 'healthy',
      components: {
        database: { status: 'healthy', message: '' },
        ollama: { status: 'healthy', message: '' },
        circuitBreaker: breaker && {
          state: breaker.state,
          failureCount: breaker.failureCount,
          successCount: breaker.successCount,
        },
        titleCache: this.titleCache.stats(),
      },
    };

    try {
      const statistics = this.database.getStatistics();
      report.components.database = {
        status: 'healthy',
        message: `Database connected - ${statistics.totalMessages} messages in ${statistics.totalConversations} conversations`,
        statistics,
      };
    } catch (error) {
      report.components.database = { status: 'error', message: errorMessage(error) };
      report.status = 'degraded';
    }

    try {
      const data = await this.ollama.listModels();
      report.components.ollama = {
        status: 'healthy',
        message: `Ollama is running with ${data.models.length} models available`,
        modelsCount: data.models.length,
      };
    } catch (error) {
      report.components.ollama = { status: 'error', message: errorMessage(error) };
      report.status = 'degraded';
    }

    return report;
  }
}

import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { ConversationService } from '../../application/services/ConversationService.js';
import { HealthService } from '../../application/services/HealthService.js';
import { Conversation, ConversationSummary } from '../../core/entities/Conversation.js';
import { ChatError, ChatErrorCode, errorMessage } from '../../core/errors.js';
import { Logger, createLogger } from '../../utils/logger.js';

const STATUS_BY_CODE: Record<ChatErrorCode, number> = {
  invalid_argument: 400,
  not_found: 404,
  deadline_exceeded: 504,
  internal: 500,
};

/**
 * HTTP status for an error: the chat error code, or the 4xx status that
 * middleware such as the JSON body parser attached to its error
 */
export function statusForError(error: unknown): number {
  if (error instanceof ChatError) {
    return STATUS_BY_CODE[error.code];
  }
  return clientErrorStatus(error) ?? 500;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

const messageBodySchema = z.object({
  message: z.string({ required_error: 'message is required' }),
});

export type ServerEvent =
  | { type: 'connected'; timestamp: string }
  | { type: 'conversation_updated'; conversationId: string; title: string; timestamp: string };

function serializeSummary(summary: ConversationSummary) {
  return {
    id: summary.id,
    title: summary.title,
    message_count: summary.messageCount,
    created_at: summary.createdAt.toISOString(),
    updated_at: summary.updatedAt.toISOString(),
  };
}

function serializeConversation(conversation: Conversation) {
  return {
    id: conversation.id,
    title: conversation.title,
    created_at: conversation.createdAt.toISOString(),
    updated_at: conversation.updatedAt.toISOString(),
    messages: conversation.messages.map((msg) => ({
      id: msg.id,
      role: msg.role,
      content: msg.content,
      created_at: msg.createdAt.toISOString(),
      updated_at: msg.updatedAt.toISOString(),
    })),
  };
}

/**
 * JSON HTTP API over the conversation service, with a WebSocket channel
 * that announces every stored turn
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private log: Logger;

  constructor(
    private conversationService: ConversationService,
    private healthService: HealthService,
    private port: number = 3001
  ) {
    this.log = createLogger('web');
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    // API: Start a conversation
    this.app.post('/api/conversations', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = messageBodySchema.safeParse(req.body);
        if (!body.success) {
          res.status(400).json({ success: false, error: body.error.issues[0]?.message ?? 'invalid body' });
          return;
        }
        const result = await this.conversationService.startConversation({ message: body.data.message });
        res.status(201).json({
          success: true,
          data: { conversation_id: result.conversationId, title: result.title, reply: result.reply },
        });
      } catch (error) {
        next(error);
      }
    });

    // API: Continue a conversation
    this.app.post(
      '/api/conversations/:id/messages',
      async (req: Request, res: Response, next: NextFunction) => {
        try {
          const body = messageBodySchema.safeParse(req.body);
          if (!body.success) {
            res.status(400).json({ success: false, error: body.error.issues[0]?.message ?? 'invalid body' });
            return;
          }
          const result = await this.conversationService.continueConversation({
            conversationId: req.params.id,
            message: body.data.message,
          });
          res.json({ success: true, data: { reply: result.reply } });
        } catch (error) {
          next(error);
        }
      }
    );

    // API: List conversations
    this.app.get('/api/conversations', async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const conversations = await this.conversationService.listConversations();
        res.json({ success: true, data: conversations.map(serializeSummary) });
      } catch (error) {
        next(error);
      }
    });

    // API: Describe a conversation
    this.app.get('/api/conversations/:id', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const conversation = await this.conversationService.describeConversation(req.params.id);
        res.json({ success: true, data: serializeConversation(conversation) });
      } catch (error) {
        next(error);
      }
    });

    // API: Health
    this.app.get('/api/health', async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const health = await this.healthService.check();
        res.status(health.status === 'healthy' ? 200 : 503).json({ success: true, data: health });
      } catch (error) {
        next(error);
      }
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const status = statusForError(error);
      if (status >= 500) {
        this.log.error('request_failed', { method: req.method, path: req.path, status, error });
      }
      res.status(status).json({ success: false, error: errorMessage(error) });
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.log.debug('websocket_connected', { clients: this.clients.size + 1 });
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.log.warn('websocket_error', { error });
        this.clients.delete(ws);
      });

      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });
  }

  private send(client: WebSocket, event: ServerEvent): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(event));
    }
  }

  broadcast(event: ServerEvent): void {
    this.clients.forEach((client) => this.send(client, event));
  }

  notifyConversationUpdate(conversation: Conversation): void {
    this.broadcast({
      type: 'conversation_updated',
      conversationId: conversation.id,
      title: conversation.title,
      timestamp: new Date().toISOString(),
    });
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.log.info('web_api_listening', { url: `http://localhost:${this.port}` });
        this.setupWebSocket();
        resolve();
      });
      server.on('error', (error) => {
        this.log.error('web_server_error', { error });
        reject(error);
      });
      this.httpServer = server;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      this.wss?.close();
      this.wss = null;

      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.log.info('web_api_stopped');
        resolve();
      });
      this.httpServer = null;
    });
  }
}

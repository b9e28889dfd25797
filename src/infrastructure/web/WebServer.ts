import cors from 'cors';
import express, { ErrorRequestHandler, Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { AddressInfo } from 'net';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { ChatbotService } from '../../application/services/ChatbotService.js';
import { ConversationFlow } from '../../application/services/ConversationFlow.js';
import { ConversationManagerRegistry } from '../../application/services/ConversationManagerRegistry.js';
import { DEFAULT_SESSION_ID } from '../../core/entities/Chat.js';
import { RESPONSE_TYPES } from '../../core/entities/Conversation.js';
import type { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { Logger, silentLogger } from '../../utils/logger.js';

const ResponseTypeSchema = z.enum(['standard', 'creative', 'factual']);

const ChatBodySchema = z.object({
  session_id: z.string().min(1).default(DEFAULT_SESSION_ID),
  message: z.string(),
  response_type: ResponseTypeSchema.optional(),
  temperature: z.number().min(0).max(1).optional(),
  search: z.boolean().optional(),
});

const StyleBodySchema = z.object({
  response_type: ResponseTypeSchema,
});

const SocketMessageSchema = ChatBodySchema.extend({
  type: z.literal('chat'),
});

type ChatBody = z.infer<typeof ChatBodySchema>;

export interface UiSettings {
  pageTitle: string;
  layout: string;
  appTitle: string;
  appMessage: string;
  chatbotName: string;
}

export interface WebServerDeps {
  flow: ConversationFlow;
  conversations: ConversationManagerRegistry;
  chatbot: ChatbotService;
  ui: UiSettings;
  archive?: IConversationRepository;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`).join('; ');
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * HTTP + WebSocket surface for chat UIs
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private logger: Logger;

  constructor(private deps: WebServerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    const { conversations, chatbot, ui, archive } = this.deps;

    this.app.get('/api/health', (req: Request, res: Response) => {
      chatbot
        .getStatus()
        .then((status) => res.json({ success: true, data: status }))
        .catch((error: unknown) => this.sendError(res, error));
    });

    this.app.get('/api/ui-config', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: {
          ...ui,
          responseTypes: RESPONSE_TYPES,
          search: chatbot.hasSearch(),
        },
      });
    });

    this.app.get('/api/sessions', (req: Request, res: Response) => {
      try {
        res.json({
          success: true,
          data: {
            active: conversations.list(),
            archived: archive ? archive.getAllSessions() : [],
          },
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.post('/api/chat', (req: Request, res: Response) => {
      const body = ChatBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: describeIssues(body.error) });
        return;
      }

      this.deps.flow
        .completeTurn(body.data.session_id, body.data.message, this.turnOptions(body.data))
        .then((response) => {
          this.notifyConversationUpdate(body.data.session_id);
          res.json({ success: true, data: response });
        })
        .catch((error: unknown) => this.sendError(res, error));
    });

    this.app.post('/api/chat/stream', (req: Request, res: Response) => {
      const body = ChatBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: describeIssues(body.error) });
        return;
      }

      this.streamToResponse(body.data, res).catch((error: unknown) => {
        this.logger.error('Streaming chat failed', { session_id: body.data.session_id, error });
        if (!res.headersSent) {
          this.sendError(res, error);
        } else {
          res.end();
        }
      });
    });

    this.app.get('/api/conversations/:sessionId', (req: Request, res: Response) => {
      const { sessionId } = req.params;
      const manager = conversations.get(sessionId);
      res.json({
        success: true,
        data: {
          session_id: sessionId,
          response_style: manager ? manager.getResponseStyle() : 'standard',
          messages: manager ? manager.history() : [],
        },
      });
    });

    this.app.delete('/api/conversations/:sessionId', (req: Request, res: Response) => {
      try {
        const { sessionId } = req.params;
        const manager = conversations.get(sessionId);
        if (manager) {
          manager.clear();
        } else {
          archive?.clearHistory(sessionId);
        }
        this.broadcast({ type: 'conversation_cleared', sessionId });
        res.json({ success: true, message: 'Conversation cleared' });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.put('/api/conversations/:sessionId/style', (req: Request, res: Response) => {
      const body = StyleBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: describeIssues(body.error) });
        return;
      }

      const manager = conversations.getOrCreate(req.params.sessionId);
      manager.setResponseStyle(body.data.response_type);
      res.json({
        success: true,
        data: { session_id: manager.sessionId, response_style: manager.getResponseStyle() },
      });
    });

    // express.json() reports unparseable bodies here
    const malformedBody: ErrorRequestHandler = (err, req, res, next) => {
      if (err instanceof SyntaxError) {
        res.status(400).json({ success: false, error: 'Malformed JSON body' });
        return;
      }
      next(err);
    };
    this.app.use(malformedBody);
  }

  private async streamToResponse(body: ChatBody, res: Response): Promise<void> {
    let disconnected = false;
    res.on('close', () => {
      if (!res.writableEnded) {
        disconnected = true;
      }
    });

    res.status(200);
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache');
    res.flushHeaders();

    for await (const chunk of this.deps.flow.streamTurn(body.session_id, body.message, this.turnOptions(body))) {
      if (disconnected) {
        this.logger.debug(`Client left stream for session ${body.session_id}`);
        return;
      }
      res.write(chunk);
    }

    res.end();
    this.notifyConversationUpdate(body.session_id);
  }

  private turnOptions(body: ChatBody) {
    return {
      responseType: body.response_type,
      temperature: body.temperature,
      search: body.search,
    };
  }

  private sendError(res: Response, error: unknown): void {
    this.logger.error('Request failed', { error });
    res.status(500).json({ success: false, error: errorMessage(error) });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('New WebSocket client connected');
      this.clients.add(ws);

      ws.on('message', (data) => {
        this.handleSocketMessage(ws, rawDataToString(data)).catch((error: unknown) => {
          this.logger.error('WebSocket chat failed', { error });
          this.send(ws, { type: 'error', error: errorMessage(error) });
        });
      });

      ws.on('close', () => {
        this.logger.debug('WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket error', { error });
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });
  }

  private async handleSocketMessage(ws: WebSocket, text: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      this.send(ws, { type: 'error', error: 'Malformed JSON message' });
      return;
    }

    const message = SocketMessageSchema.safeParse(json);
    if (!message.success) {
      this.send(ws, { type: 'error', error: describeIssues(message.error) });
      return;
    }

    const body = message.data;
    let reply = '';
    for await (const chunk of this.deps.flow.streamTurn(body.session_id, body.message, this.turnOptions(body))) {
      if (ws.readyState !== WebSocket.OPEN) {
        return;
      }
      reply += chunk;
      this.send(ws, { type: 'chunk', session_id: body.session_id, content: chunk });
    }

    this.send(ws, { type: 'done', session_id: body.session_id, message: reply });
    this.notifyConversationUpdate(body.session_id);
  }

  private send(ws: WebSocket, message: Record<string, unknown>): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  public broadcast(message: Record<string, unknown>): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyConversationUpdate(sessionId: string): void {
    this.broadcast({
      type: 'conversation_updated',
      sessionId,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Listen on the given port; 0 picks a free one. Resolves with the bound port.
   */
  public start(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        this.setupWebSocket();
        const bound = this.getPort();
        this.logger.info(`API available at http://localhost:${bound}`);
        resolve(bound);
      });
      this.httpServer = server;

      server.on('error', (error) => {
        this.logger.error('Server error', { error });
        reject(error);
      });
    });
  }

  public getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      const info: AddressInfo = address;
      return info.port;
    }
    return 0;
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.terminate();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      const server = this.httpServer;
      this.httpServer = null;
      if (server) {
        server.closeAllConnections();
        server.close(() => {
          this.logger.debug('HTTP server closed');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}

/**
 * Renderer Bridge
 *
 * Local WebSocket server that a drawing process connects to. Render intents
 * from the engine are broadcast to every connected renderer; clicks and
 * hovers come back as requests and go straight into the engine.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createLogger, getErrorMessage } from '@xnotid/core';
import type {
  EngineEvent,
  Logger,
  NotificationEngine,
  NotificationView,
  RenderIntent,
} from '@xnotid/core';
import { broadcastWsMessage, sendWsMessage } from './ws-utils.js';
import type {
  DisplaySettings,
  HelloMessage,
  RendererMessage,
  RendererNotification,
  ServerMessage,
} from './types.js';

export interface RendererBridgeOptions {
  engine: NotificationEngine;
  display: DisplaySettings;
  host: string;
  /** 0 picks a free port */
  port: number;
  logger?: Logger;
}

export class BridgeRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BridgeRequestError';
  }
}

// ============================================================
// Message conversion
// ============================================================

export function toRendererNotification(view: NotificationView): RendererNotification {
  return {
    id: view.id,
    appName: view.appName,
    summary: view.summary,
    body: view.body,
    icon: view.icon,
    actions: view.actions.map((action) => ({ ...action })),
    details: view.details,
    card: view.card,
    acknowledgeToDismiss: view.acknowledgeToDismiss,
    createdAt: view.createdAt,
    updatedAt: view.updatedAt,
  };
}

function fromIntent(intent: RenderIntent): ServerMessage {
  switch (intent.type) {
    case 'show_popup':
      return { type: 'show_popup', slot: intent.slot, notification: toRendererNotification(intent.notification) };
    case 'update_popup':
      return { type: 'update_popup', slot: intent.slot, notification: toRendererNotification(intent.notification) };
    case 'remove_popup':
      return { type: 'remove_popup', slot: intent.slot, id: intent.id };
    case 'show_center':
      return { type: 'show_center', entries: intent.entries };
    case 'hide_center':
      return { type: 'hide_center' };
  }
}

/** Engine events renderers care about, as bridge messages. */
export function toServerMessage(event: EngineEvent): ServerMessage | null {
  switch (event.type) {
    case 'render':
      return fromIntent(event.intent);
    case 'dnd_changed':
      return { type: 'dnd_changed', enabled: event.enabled };
    default:
      return null;
  }
}

function requireId(message: Record<string, unknown>): number {
  const { id } = message;
  if (typeof id !== 'number' || !Number.isInteger(id) || id < 0) {
    throw new BridgeRequestError(`"${String(message.type)}" needs an integer "id"`);
  }
  return id;
}

/**
 * Validate a raw renderer message. Throws BridgeRequestError with a message
 * fit to send back to the renderer.
 */
export function parseRendererMessage(raw: string): RendererMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new BridgeRequestError('invalid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new BridgeRequestError('message must be a JSON object');
  }

  const message: Record<string, unknown> = { ...parsed };
  switch (message.type) {
    case 'dismiss':
      return { type: 'dismiss', id: requireId(message) };
    case 'acknowledge':
      return { type: 'acknowledge', id: requireId(message) };
    case 'invoke_action': {
      const id = requireId(message);
      if (typeof message.key !== 'string') {
        throw new BridgeRequestError('"invoke_action" needs a string "key"');
      }
      return { type: 'invoke_action', id, key: message.key };
    }
    case 'submit_choices': {
      const id = requireId(message);
      const { selected, other } = message;
      if (!Array.isArray(selected) || !selected.every((item): item is string => typeof item === 'string')) {
        throw new BridgeRequestError('"submit_choices" needs a string array "selected"');
      }
      if (other !== undefined && other !== null && typeof other !== 'string') {
        throw new BridgeRequestError('"other" must be a string or null');
      }
      return { type: 'submit_choices', id, selected, other: other ?? null };
    }
    case 'hover': {
      const id = requireId(message);
      if (typeof message.inside !== 'boolean') {
        throw new BridgeRequestError('"hover" needs a boolean "inside"');
      }
      return { type: 'hover', id, inside: message.inside };
    }
    case 'toggle_center':
    case 'clear_center':
    case 'toggle_dnd':
      return { type: message.type };
    default:
      throw new BridgeRequestError(`unknown message type: ${JSON.stringify(message.type)}`);
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

// ============================================================
// Bridge
// ============================================================

export class RendererBridge {
  private engine: NotificationEngine;
  private display: DisplaySettings;
  private host: string;
  private port: number;
  private logger: Logger;

  private wss: WebSocketServer | null = null;
  private clients = new Set<WebSocket>();
  private unsubscribe: () => void;

  constructor(options: RendererBridgeOptions) {
    this.engine = options.engine;
    this.display = options.display;
    this.host = options.host;
    this.port = options.port;
    this.logger = options.logger ?? createLogger({ silent: true });

    this.unsubscribe = this.engine.subscribe((event) => this.handleEngineEvent(event));
  }

  private get log() { return this.logger.log.bind(this.logger); }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Start listening. Resolves with the bound port. */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      let listening = false;
      const wss = new WebSocketServer({ host: this.host, port: this.port });
      this.wss = wss;

      wss.on('error', (err: NodeJS.ErrnoException) => {
        if (!listening) {
          if (err.code === 'EADDRINUSE') {
            this.logger.error(`[Bridge] Port ${this.port} is already in use`);
          }
          reject(err);
          return;
        }
        this.logger.error(`[Bridge] Server error: ${err.message}`);
      });

      wss.on('listening', () => {
        listening = true;
        const address = wss.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.port;
        this.log(`[Bridge] Listening on ws://${this.host}:${port}`);
        resolve(port);
      });

      wss.on('connection', (ws) => this.handleConnection(ws));
    });
  }

  stop(): Promise<void> {
    this.unsubscribe();
    for (const ws of this.clients) {
      ws.terminate();
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.log('[Bridge] Stopped');
          resolve();
        }
      });
    });
  }

  handleConnection(ws: WebSocket): void {
    this.clients.add(ws);
    this.log(`[Bridge] Renderer connected (${this.clients.size} total)`);

    ws.on('message', (data: RawData) => this.handleMessage(ws, rawDataToString(data)));
    ws.on('close', () => {
      this.clients.delete(ws);
      this.log(`[Bridge] Renderer disconnected (${this.clients.size} left)`);
    });
    ws.on('error', (err: Error) => {
      this.logger.warn(`[Bridge] Renderer connection error: ${err.message}`);
    });

    sendWsMessage(ws, this.buildHello());
  }

  handleMessage(ws: WebSocket, raw: string): void {
    let message: RendererMessage;
    try {
      message = parseRendererMessage(raw);
    } catch (err) {
      this.logger.debug(`[Bridge] Rejected message: ${getErrorMessage(err)}`);
      sendWsMessage(ws, { type: 'error', message: getErrorMessage(err) });
      return;
    }

    try {
      this.dispatch(message);
    } catch (err) {
      this.logger.warn(`[Bridge] ${message.type} failed: ${getErrorMessage(err)}`);
      sendWsMessage(ws, { type: 'error', message: getErrorMessage(err) });
    }
  }

  private dispatch(message: RendererMessage): void {
    switch (message.type) {
      case 'dismiss':
        this.engine.dismiss(message.id);
        break;
      case 'invoke_action':
        this.engine.invokeAction(message.id, message.key);
        break;
      case 'submit_choices':
        this.engine.submitChoices(message.id, message.selected, message.other);
        break;
      case 'hover':
        if (message.inside) {
          this.engine.pauseExpiry(message.id);
        } else {
          this.engine.resumeExpiry(message.id);
        }
        break;
      case 'toggle_center':
        this.engine.toggleCenter();
        break;
      case 'acknowledge':
        this.engine.acknowledge(message.id);
        break;
      case 'clear_center':
        this.engine.clearCenter();
        break;
      case 'toggle_dnd': {
        const before = this.engine.snapshot().doNotDisturb;
        if (this.engine.toggleDoNotDisturb() === before) {
          throw new BridgeRequestError('do-not-disturb is disabled in the configuration');
        }
        break;
      }
    }
  }

  private buildHello(): HelloMessage {
    const snapshot = this.engine.snapshot();
    return {
      type: 'hello',
      display: this.display,
      popups: snapshot.popups.map(({ slot, notification }) => ({
        slot,
        notification: toRendererNotification(notification),
      })),
      center: snapshot.center,
      centerVisible: snapshot.centerVisible,
      doNotDisturb: snapshot.doNotDisturb,
    };
  }

  private handleEngineEvent(event: EngineEvent): void {
    const message = toServerMessage(event);
    if (message) {
      broadcastWsMessage(this.clients, message);
    }
  }
}

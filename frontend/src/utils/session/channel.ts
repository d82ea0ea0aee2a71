import { sessionWsUrl } from '../../config/api';
import { ChannelFailure } from './errors';
import logger from '../core/logger';

export interface ChannelHandlers {
  onMessage: (raw: string) => void;
  onClose: (info: { code?: number; reason?: string }) => void;
}

/** Duplex transport for one project session. */
export interface SessionChannel {
  open(): Promise<void>;
  send(data: string): void;
  close(): void;
}

export type ChannelFactory = (projectId: string, handlers: ChannelHandlers) => SessionChannel;

/** Browser WebSocket at `/ws/{projectId}`. */
export function createWebSocketChannel(
  projectId: string,
  handlers: ChannelHandlers,
  url: string = sessionWsUrl(projectId)
): SessionChannel {
  let socket: WebSocket | null = null;
  let abortOpen: ((reason: ChannelFailure) => void) | null = null;

  const deliver = (raw: string) => {
    if (raw) handlers.onMessage(raw);
  };

  return {
    open() {
      return new Promise<void>((resolve, reject) => {
        logger.info('[SESSION_WS] connect', { projectId, url });
        const ws = new WebSocket(url);
        socket = ws;
        let opened = false;
        abortOpen = reject;

        ws.onopen = () => {
          opened = true;
          abortOpen = null;
          logger.info('[SESSION_WS] open', { projectId });
          resolve();
        };

        ws.onmessage = (event: MessageEvent) => {
          if (typeof event.data === 'string') {
            deliver(event.data);
            return;
          }
          if (typeof Blob !== 'undefined' && event.data instanceof Blob) {
            event.data
              .text()
              .then(deliver)
              .catch((error: unknown) => {
                logger.warn('[SESSION_WS] Failed to decode blob payload', { projectId, error });
              });
            return;
          }
          logger.warn('[SESSION_WS] Unsupported message format', { projectId });
        };

        ws.onerror = () => {
          logger.warn('[SESSION_WS] socket error', { projectId });
        };

        ws.onclose = (event: CloseEvent) => {
          logger.info('[SESSION_WS] socket closed', { projectId, code: event.code, reason: event.reason });
          if (socket === ws) socket = null;
          if (!opened) {
            abortOpen = null;
            reject(new ChannelFailure(`WebSocket for ${projectId} closed before opening`, event.code));
            return;
          }
          handlers.onClose({ code: event.code, reason: event.reason });
        };
      });
    },

    send(data: string) {
      if (!socket || socket.readyState !== WebSocket.OPEN) {
        throw new ChannelFailure(`WebSocket for ${projectId} is not open`);
      }
      socket.send(data);
    },

    close() {
      const ws = socket;
      socket = null;
      if (abortOpen) {
        abortOpen(new ChannelFailure(`WebSocket for ${projectId} closed while connecting`));
        abortOpen = null;
      }
      if (!ws) return;
      ws.onclose = null;
      ws.onmessage = null;
      try {
        ws.close();
      } catch (error) {
        logger.warn('[SESSION_WS] Failed to close socket', { projectId, error });
      }
    },
  };
}

import { createWebSocketChannel } from '../channel';
import { ChannelFailure } from '../errors';

class FakeSocket {
  static readonly OPEN = 1;
  static instances: FakeSocket[] = [];

  readyState = 0;
  sent: string[] = [];
  closed = false;
  onopen: (() => void) | null = null;
  onmessage: ((event: { data: unknown }) => void) | null = null;
  onerror: (() => void) | null = null;
  onclose: ((event: { code: number; reason: string }) => void) | null = null;

  constructor(readonly url: string) {
    FakeSocket.instances.push(this);
  }

  send(data: string) {
    this.sent.push(data);
  }

  close() {
    this.closed = true;
  }

  serverOpen() {
    this.readyState = FakeSocket.OPEN;
    this.onopen?.();
  }

  serverClose(code: number, reason: string) {
    this.readyState = 3;
    this.onclose?.({ code, reason });
  }
}

const latestSocket = (): FakeSocket => {
  const socket = FakeSocket.instances[FakeSocket.instances.length - 1];
  if (!socket) throw new Error('no socket created');
  return socket;
};

describe('createWebSocketChannel', () => {
  const originalWebSocket = globalThis.WebSocket;

  beforeEach(() => {
    FakeSocket.instances = [];
    Object.defineProperty(globalThis, 'WebSocket', { value: FakeSocket, configurable: true, writable: true });
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    Object.defineProperty(globalThis, 'WebSocket', { value: originalWebSocket, configurable: true, writable: true });
    jest.restoreAllMocks();
  });

  it('opens the project socket and delivers text frames', async () => {
    const onMessage = jest.fn();
    const channel = createWebSocketChannel('p1', { onMessage, onClose: jest.fn() });

    const opening = channel.open();
    const socket = latestSocket();
    expect(socket.url).toBe('ws://localhost:8000/ws/p1');
    socket.serverOpen();
    await opening;

    socket.onmessage?.({ data: '{"type":"prompt","prompt":"x"}' });
    socket.onmessage?.({ data: '' });
    socket.onmessage?.({ data: 42 });
    expect(onMessage.mock.calls).toEqual([['{"type":"prompt","prompt":"x"}']]);

    channel.send('{"type":"chat","message":"hi"}');
    expect(socket.sent).toEqual(['{"type":"chat","message":"hi"}']);
  });

  it('refuses to send before the socket is open', () => {
    const channel = createWebSocketChannel('p1', { onMessage: jest.fn(), onClose: jest.fn() });
    expect(() => channel.send('x')).toThrow(ChannelFailure);

    void channel.open().catch(() => undefined);
    expect(() => channel.send('x')).toThrow('WebSocket for p1 is not open');
    channel.close();
  });

  it('rejects the open when the socket closes first', async () => {
    const onClose = jest.fn();
    const channel = createWebSocketChannel('p1', { onMessage: jest.fn(), onClose });
    const opening = channel.open();
    latestSocket().serverClose(1006, 'refused');

    await expect(opening).rejects.toThrow('WebSocket for p1 closed before opening');
    await expect(opening).rejects.toMatchObject({ code: 1006 });
    expect(onClose).not.toHaveBeenCalled();
  });

  it('reports a close after open to the handler', async () => {
    const onClose = jest.fn();
    const channel = createWebSocketChannel('p1', { onMessage: jest.fn(), onClose });
    const opening = channel.open();
    const socket = latestSocket();
    socket.serverOpen();
    await opening;

    socket.serverClose(1011, 'server restart');
    expect(onClose).toHaveBeenCalledWith({ code: 1011, reason: 'server restart' });
  });

  it('rejects a pending open when closed locally', async () => {
    const channel = createWebSocketChannel('p1', { onMessage: jest.fn(), onClose: jest.fn() });
    const opening = channel.open();
    const socket = latestSocket();

    channel.close();
    await expect(opening).rejects.toThrow('WebSocket for p1 closed while connecting');
    expect(socket.closed).toBe(true);
    expect(socket.onclose).toBeNull();
  });
});

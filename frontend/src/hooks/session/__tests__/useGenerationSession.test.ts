import { act, renderHook, waitFor } from '@testing-library/react';
import { useGenerationSession } from '../useGenerationSession';
import { fakeTransport } from '../../../test/fakeChannel';
import type { ProjectApi } from '../../../utils/api';

describe('useGenerationSession', () => {
  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stays idle without a project id', () => {
    const { result } = renderHook(() => useGenerationSession(null));
    expect(result.current.session).toBeNull();
    expect(result.current.snapshot).toBeNull();
  });

  it('records the initial prompt and follows channel events', async () => {
    const { factory, channels } = fakeTransport();
    const { result } = renderHook(() =>
      useGenerationSession('p1', { channelFactory: factory, initialPrompt: 'a snake game' })
    );

    await waitFor(() => expect(result.current.snapshot?.connection).toBe('connected'));
    expect(result.current.snapshot?.prompt).toBe('a snake game');
    expect(result.current.snapshot?.isGenerating).toBe(true);

    act(() => {
      channels[0].emit({ type: 'file_update', file: 'main.py', content: 'print(1)' });
      channels[0].emit({ type: 'complete', files: [{ name: 'main.py', content: 'print(1)' }] });
    });

    expect(result.current.snapshot?.files).toEqual({ 'main.py': 'print(1)' });
    expect(result.current.snapshot?.selectedFile).toBe('main.py');
    expect(result.current.snapshot?.status).toBe('completed');
  });

  it('loads the project when no prompt was given', async () => {
    const { factory } = fakeTransport();
    const api: ProjectApi = {
      createProject: jest.fn(),
      getProjectFile: jest.fn(),
      getProject: jest.fn().mockResolvedValue({
        data: { prompt: 'todo app', status: 'completed', files: [{ name: 'app.py', content: 'x' }] },
        status: 200,
      }),
    };
    const { result } = renderHook(() => useGenerationSession('p1', { channelFactory: factory, api }));

    await waitFor(() => expect(result.current.snapshot?.connection).toBe('connected'));
    expect(result.current.snapshot?.prompt).toBe('todo app');
    expect(result.current.snapshot?.fileOrder).toEqual(['app.py']);
    expect(result.current.connectionError).toBeNull();
  });

  it('surfaces a failed start as a connection error', async () => {
    const { factory, modes } = fakeTransport();
    modes.push('fail');
    const { result } = renderHook(() => useGenerationSession('p1', { channelFactory: factory }));

    await waitFor(() => expect(result.current.connectionError).toBe('refused'));
    expect(result.current.snapshot?.connection).toBe('disconnected');
  });

  it('sends chat through the session', async () => {
    const { factory, channels } = fakeTransport();
    const { result } = renderHook(() => useGenerationSession('p1', { channelFactory: factory }));
    await waitFor(() => expect(result.current.snapshot?.connection).toBe('connected'));

    let sent = false;
    await act(async () => {
      sent = await result.current.sendChat('rename the module');
    });

    expect(sent).toBe(true);
    expect(channels[0].sent).toEqual(['{"type":"chat","message":"rename the module"}']);
  });

  it('closes the session on unmount', async () => {
    const { factory, channels } = fakeTransport();
    const { result, unmount } = renderHook(() => useGenerationSession('p1', { channelFactory: factory }));
    await waitFor(() => expect(result.current.snapshot?.connection).toBe('connected'));

    const session = result.current.session;
    unmount();
    expect(channels[0].closed).toBe(true);
    expect(session?.isClosed).toBe(true);
  });
});

import React from 'react';
import { act, render, screen, fireEvent, waitFor } from '@testing-library/react';
import App, { projectIdFromPath } from '../App';
import type { ProjectApi } from '../utils/api';
import { fakeTransport } from '../test/fakeChannel';

jest.mock('react-resizable-panels', () => ({
  PanelGroup: ({ children }: { children?: React.ReactNode }) => <div>{children}</div>,
  Panel: ({ children }: { children?: React.ReactNode }) => <div>{children}</div>,
  PanelResizeHandle: () => <div />,
}));

const fakeApi = (overrides: Partial<ProjectApi> = {}): ProjectApi => ({
  createProject: jest.fn().mockResolvedValue({ data: { projectId: 'p42' }, status: 200 }),
  getProject: jest.fn().mockResolvedValue({ data: { prompt: '', files: [] }, status: 200 }),
  getProjectFile: jest.fn(),
  ...overrides,
});

describe('projectIdFromPath', () => {
  it('extracts the project id from the project route', () => {
    expect(projectIdFromPath('/project/abc')).toBe('abc');
    expect(projectIdFromPath('/project/a%20b/')).toBe('a b');
    expect(projectIdFromPath('/')).toBeNull();
    expect(projectIdFromPath('/project/a/b')).toBeNull();
  });
});

describe('App', () => {
  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    window.history.pushState(null, '', '/');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates a project and opens its session view', async () => {
    const api = fakeApi();
    const { factory } = fakeTransport();
    render(<App api={api} channelFactory={factory} />);

    fireEvent.change(screen.getByLabelText('Prompt'), { target: { value: ' a pong game ' } });
    await act(async () => {
      fireEvent.click(screen.getByText('Generate'));
    });

    expect(api.createProject).toHaveBeenCalledWith({ prompt: 'a pong game', model: 'gpt-4o-mini', temperature: 0.1 });
    expect(window.location.pathname).toBe('/project/p42');
    await waitFor(() => expect(screen.getByTestId('connection-status').textContent).toBe('Connected'));
    expect(screen.getByRole('heading').textContent).toBe('a pong game');
    expect(api.getProject).not.toHaveBeenCalled();

    fireEvent.click(screen.getByText('← New project'));
    expect(window.location.pathname).toBe('/');
    expect(screen.getByText('Describe the code you want')).toBeTruthy();
  });

  it('shows the error when creation fails', async () => {
    const api = fakeApi({
      createProject: jest.fn().mockResolvedValue({ error: 'Prompt is required', status: 400 }),
    });
    render(<App api={api} />);

    fireEvent.change(screen.getByLabelText('Prompt'), { target: { value: 'x' } });
    await act(async () => {
      fireEvent.click(screen.getByText('Generate'));
    });

    expect(screen.getByRole('alert').textContent).toBe('Prompt is required');
    expect(window.location.pathname).toBe('/');
  });

  it('loads an existing project from the url', async () => {
    window.history.pushState(null, '', '/project/p7');
    const api = fakeApi({
      getProject: jest.fn().mockResolvedValue({
        data: { prompt: 'weather cli', status: 'completed', files: [{ name: 'cli.py', content: 'print("sunny")' }] },
        status: 200,
      }),
    });
    const { factory } = fakeTransport();
    const { container } = render(<App api={api} channelFactory={factory} />);

    await waitFor(() => expect(screen.getByTestId('connection-status').textContent).toBe('Connected'));
    expect(api.getProject).toHaveBeenCalledWith('p7');
    expect(screen.getByTestId('generation-status').textContent).toBe('Completed');
    expect(container.querySelector('code.language-python')?.textContent).toBe('print("sunny")');
  });
});

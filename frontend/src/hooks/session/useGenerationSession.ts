import { useCallback, useEffect, useRef, useState } from 'react';
import type { SessionSnapshot } from '../../types/session';
import type { ProjectApi } from '../../utils/api';
import type { ChannelFactory } from '../../utils/session/channel';
import { GenerationSession } from '../../utils/session/GenerationSession';
import logger from '../../utils/core/logger';

export interface UseGenerationSessionOptions {
  channelFactory?: ChannelFactory;
  api?: ProjectApi;
  /** Set when the project was just created here; skips the project fetch. */
  initialPrompt?: string;
}

export interface UseGenerationSessionResult {
  session: GenerationSession | null;
  snapshot: SessionSnapshot | null;
  connectionError: string | null;
  sendChat: (message: string) => Promise<boolean>;
  selectFile: (path: string) => void;
  showContent: () => void;
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * One GenerationSession per project id for the lifetime of the calling component.
 * Changing the id closes the old session and opens a new one.
 */
export function useGenerationSession(
  projectId: string | null,
  options: UseGenerationSessionOptions = {}
): UseGenerationSessionResult {
  const [session, setSession] = useState<GenerationSession | null>(null);
  const [snapshot, setSnapshot] = useState<SessionSnapshot | null>(null);
  const [connectionError, setConnectionError] = useState<string | null>(null);
  const optionsRef = useRef(options);
  optionsRef.current = options;

  useEffect(() => {
    if (!projectId) {
      setSession(null);
      setSnapshot(null);
      return;
    }

    const { channelFactory, api, initialPrompt } = optionsRef.current;
    const next = new GenerationSession({ projectId, channelFactory, api });
    setSession(next);
    setConnectionError(null);
    const unsubscribe = next.subscribe(setSnapshot);

    if (initialPrompt) {
      next.beginGeneration(initialPrompt);
    }

    const start = api && !initialPrompt ? next.loadProject() : next.connect();
    start.catch((err: unknown) => {
      if (next.isClosed) return;
      logger.warn(`[SESSION_HOOK] failed to start session ${projectId}`, err);
      setConnectionError(errorMessage(err));
    });

    return () => {
      unsubscribe();
      next.close();
    };
  }, [projectId]);

  const sendChat = useCallback(
    async (message: string) => {
      if (!session) return false;
      try {
        const sent = await session.sendChat(message);
        setConnectionError(null);
        return sent;
      } catch (err) {
        if (!session.isClosed) setConnectionError(errorMessage(err));
        return false;
      }
    },
    [session]
  );

  const selectFile = useCallback((path: string) => {
    session?.selectFile(path);
  }, [session]);

  const showContent = useCallback(() => {
    session?.showContent();
  }, [session]);

  return { session, snapshot, connectionError, sendChat, selectFile, showContent };
}

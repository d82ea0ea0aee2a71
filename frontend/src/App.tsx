// status: complete

import React, { useCallback, useEffect, useState } from 'react';
import './styles/app/App.css';
import { GenerationWindow } from './sections/GenerationWindow';
import { AVAILABLE_MODELS, DEFAULT_MODEL, DEFAULT_TEMPERATURE } from './config/session';
import { projectApi } from './utils/api';
import type { ProjectApi } from './utils/api';
import type { ChannelFactory } from './utils/session/channel';
import logger from './utils/core/logger';

const PROJECT_ROUTE = /^\/project\/([^/]+)\/?$/;

export const projectIdFromPath = (pathname: string): string | null => {
  const match = PROJECT_ROUTE.exec(pathname);
  return match ? decodeURIComponent(match[1]) : null;
};

interface AppProps {
  api?: ProjectApi;
  channelFactory?: ChannelFactory;
}

interface ActiveProject {
  id: string;
  /** Present only when the project was created in this tab. */
  prompt?: string;
}

const App: React.FC<AppProps> = ({ api = projectApi, channelFactory }) => {
  const [project, setProject] = useState<ActiveProject | null>(() => {
    const id = projectIdFromPath(window.location.pathname);
    return id ? { id } : null;
  });
  const [prompt, setPrompt] = useState('');
  const [model, setModel] = useState<string>(DEFAULT_MODEL);
  const [temperature, setTemperature] = useState(DEFAULT_TEMPERATURE);
  const [isSubmitting, setIsSubmitting] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const onPopState = () => {
      const id = projectIdFromPath(window.location.pathname);
      setProject(id ? { id } : null);
    };
    window.addEventListener('popstate', onPopState);
    return () => window.removeEventListener('popstate', onPopState);
  }, []);

  const handleSubmit = useCallback(
    async (e: React.FormEvent) => {
      e.preventDefault();
      const text = prompt.trim();
      if (!text || isSubmitting) return;

      setIsSubmitting(true);
      setError(null);
      const res = await api.createProject({ prompt: text, model, temperature });
      setIsSubmitting(false);

      if (!res.data) {
        logger.warn(`[APP] project creation failed (${res.status}): ${res.error}`);
        setError(res.error || 'Failed to create project');
        return;
      }

      logger.info(`[APP] created project ${res.data.projectId}`);
      window.history.pushState(null, '', `/project/${encodeURIComponent(res.data.projectId)}`);
      setProject({ id: res.data.projectId, prompt: text });
      setPrompt('');
    },
    [api, prompt, model, temperature, isSubmitting]
  );

  const handleBackToHome = useCallback(() => {
    window.history.pushState(null, '', '/');
    setProject(null);
  }, []);

  if (project) {
    return (
      <GenerationWindow
        key={project.id}
        projectId={project.id}
        api={api}
        channelFactory={channelFactory}
        initialPrompt={project.prompt}
        onBackToHome={handleBackToHome}
      />
    );
  }

  return (
    <div className="home">
      <h1 className="home__title">Describe the code you want</h1>
      <form className="home__form" onSubmit={handleSubmit}>
        <textarea
          className="home__prompt"
          aria-label="Prompt"
          placeholder="A CLI that renames photos by EXIF date…"
          value={prompt}
          onChange={e => setPrompt(e.target.value)}
        />
        <div className="home__options">
          <label>
            Model
            <select value={model} onChange={e => setModel(e.target.value)}>
              {AVAILABLE_MODELS.map(m => (
                <option key={m.id} value={m.id}>
                  {m.label}
                </option>
              ))}
            </select>
          </label>
          <label>
            Temperature {temperature.toFixed(1)}
            <input
              type="range"
              min={0}
              max={1}
              step={0.1}
              value={temperature}
              onChange={e => setTemperature(Number(e.target.value))}
            />
          </label>
        </div>
        {error && (
          <div className="home__error" role="alert">
            {error}
          </div>
        )}
        <button type="submit" className="home__submit" disabled={isSubmitting || prompt.trim() === ''}>
          {isSubmitting ? 'Creating…' : 'Generate'}
        </button>
      </form>
    </div>
  );
};

export default App;

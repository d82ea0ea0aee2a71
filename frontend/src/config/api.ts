// status: complete

export const API_BASE_URL = process.env.REACT_APP_API_BASE_URL || 'http://localhost:8000';

const joinPath = (base: string, path: string): string => {
  const normalizedBase = base.replace(/\/+$/, '');
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${normalizedBase}${normalizedPath}`;
};

export const apiUrl = (path: string): string => joinPath(API_BASE_URL, path);

const toWsUrl = (httpUrl: string): string => {
  if (httpUrl.startsWith('https://')) {
    return `wss://${httpUrl.slice('https://'.length)}`;
  }
  if (httpUrl.startsWith('http://')) {
    return `ws://${httpUrl.slice('http://'.length)}`;
  }
  return httpUrl;
};

export const sessionWsUrl = (projectId: string, base: string = API_BASE_URL): string =>
  toWsUrl(joinPath(base, `/ws/${encodeURIComponent(projectId)}`));

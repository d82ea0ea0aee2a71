import hljs from 'highlight.js';
import logger from '../core/logger';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);

/**
 * Highlighted HTML for a file body. Unknown languages and highlighter failures
 * come back as escaped plain text.
 */
export const highlightCode = (code: string, language: string): string => {
  if (!code) return '';
  if (language !== 'plaintext' && hljs.getLanguage(language)) {
    try {
      return hljs.highlight(code, { language, ignoreIllegals: true }).value;
    } catch (error) {
      logger.warn(`[HIGHLIGHT] failed for ${language}, showing plain text`, error);
    }
  }
  return escapeHtml(code);
};

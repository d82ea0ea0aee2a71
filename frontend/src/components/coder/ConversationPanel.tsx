import React, { useCallback, useEffect, useRef, useState } from 'react';
import { AnimatePresence, motion } from 'framer-motion';
import type { ConversationEntry } from '../../types/session';

interface ConversationPanelProps {
  entries: ConversationEntry[];
  isGenerating: boolean;
  onSend: (message: string) => Promise<boolean>;
}

const ThinkingDots: React.FC = () => (
  <span className="thinking-dots" aria-label="thinking">
    <span>.</span>
    <span>.</span>
    <span>.</span>
  </span>
);

const entryClassName = (entry: ConversationEntry): string => {
  const classes = ['message-bubble', entry.role === 'user' ? 'user-message' : 'ai-message'];
  if (entry.kind === 'error') classes.push('ai-message--error');
  if (entry.kind === 'notice') classes.push('ai-message--notice');
  if (entry.isCode) classes.push('code-message');
  if (entry.streaming) classes.push('streaming');
  return classes.join(' ');
};

export const ConversationPanel: React.FC<ConversationPanelProps> = ({ entries, isGenerating, onSend }) => {
  const [message, setMessage] = useState('');
  const [isSending, setIsSending] = useState(false);
  const bottomRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    bottomRef.current?.scrollIntoView?.({ block: 'end' });
  }, [entries]);

  const handleSend = useCallback(async () => {
    const text = message.trim();
    if (!text || isGenerating || isSending) return;
    setIsSending(true);
    try {
      const sent = await onSend(text);
      if (sent) setMessage('');
    } finally {
      setIsSending(false);
    }
  }, [message, isGenerating, isSending, onSend]);

  const handleKeyDown = (e: React.KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key === 'Enter' && !e.shiftKey) {
      e.preventDefault();
      void handleSend();
    }
  };

  return (
    <div className="conversation-panel">
      <div className="conversation-container" role="log">
        <AnimatePresence initial={false}>
          {entries.map(entry => (
            <motion.div
              key={entry.id}
              className={entryClassName(entry)}
              data-kind={entry.kind}
              data-step={entry.step}
              initial={{ opacity: 0, y: 4 }}
              animate={{ opacity: 1, y: 0 }}
            >
              {entry.kind === 'step' && entry.step && <div className="message-step">{entry.step}</div>}
              <div className="message-content">
                {entry.text}
                {entry.streaming && entry.text === '' && <ThinkingDots />}
              </div>
            </motion.div>
          ))}
        </AnimatePresence>
        <div ref={bottomRef} />
      </div>

      {isGenerating && (
        <div className="generating-indicator">
          Generating <ThinkingDots />
        </div>
      )}

      <div className="chat-input-row">
        <textarea
          className="chat-input"
          aria-label="Follow-up request"
          placeholder="Ask for a change…"
          value={message}
          onChange={e => setMessage(e.target.value)}
          onKeyDown={handleKeyDown}
        />
        <button
          type="button"
          className="send-message-btn"
          disabled={isGenerating || isSending || message.trim() === ''}
          onClick={() => void handleSend()}
        >
          Send
        </button>
      </div>
    </div>
  );
};

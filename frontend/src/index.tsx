// status: complete

import React from 'react';
import ReactDOM from 'react-dom/client';
import './index.css';
import App from './App';
import logger from './utils/core/logger';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element');
}

logger.info('[APP] starting');

const root = ReactDOM.createRoot(container);
root.render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);

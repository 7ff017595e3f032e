/**
 * Application Entry Point
 *
 * WHAT: React application bootstrap file.
 *
 * HOW: Uses React 18's createRoot API for concurrent features.
 */

import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import './index.css';
import App from './App';

const rootElement = document.getElementById('root');
if (rootElement === null) {
  throw new Error('Missing #root element in index.html');
}

createRoot(rootElement).render(
  <StrictMode>
    <App />
  </StrictMode>
);

import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import { assistantFromEnvironment } from './services/assistant';
import { fetchRepository } from './services/github';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Could not find root element to mount to');
}

const assistant = assistantFromEnvironment();

const root = ReactDOM.createRoot(rootElement);
root.render(
  <React.StrictMode>
    <App loadRepo={fetchRepository} assistant={assistant} />
  </React.StrictMode>
);

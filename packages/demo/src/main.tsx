import React from 'react';
import { createRoot } from 'react-dom/client';
import { App } from './App';
import './style.css';

const root = document.getElementById('root');
if (!root) throw new Error('demo: #root element is missing from index.html');

createRoot(root).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);

export * from './path-browser.js';

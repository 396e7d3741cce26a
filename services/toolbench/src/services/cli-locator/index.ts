export * from './kicad-cli-locator.js';

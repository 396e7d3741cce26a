export * from './form-checks.js';
export * from './bom-panel.js';
export * from './kicad-panel.js';

export * from './run-channel.js';
export * from './task-controller.js';

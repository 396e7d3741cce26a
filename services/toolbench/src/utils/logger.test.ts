import { describe, expect, it } from 'vitest';
import { formatLogLine, runTag } from './logger.js';

describe('formatLogLine', () => {
  it('tags run entries with the panel and the short run id', () => {
    const line = formatLogLine({
      level: 'info',
      message: 'Run started',
      timestamp: '2026-01-01 00:00:00.000',
      service: 'task-controller',
      panel: 'bom',
      runId: '1a2b3c4d-0000-4000-8000-000000000000',
      command: 'python3',
    });

    expect(line).toBe(
      '2026-01-01 00:00:00.000 [info] [bom 1a2b3c4d] Run started {"service":"task-controller","command":"python3"}'
    );
  });

  it('prints entries outside a run without a tag and appends the stack', () => {
    const line = formatLogLine({
      level: 'error',
      message: 'Request failed',
      timestamp: '2026-01-01 00:00:01.000',
      code: 'INTERNAL_ERROR',
      stack: 'Error: boom\n    at handler',
    });

    expect(line).toBe(
      '2026-01-01 00:00:01.000 [error] Request failed {"code":"INTERNAL_ERROR"}\nError: boom\n    at handler'
    );
  });
});

describe('runTag', () => {
  it('shows the panel alone before a run id exists', () => {
    expect(runTag('kicad', undefined)).toBe(' [kicad]');
    expect(runTag(undefined, 'r1')).toBe('');
  });
});

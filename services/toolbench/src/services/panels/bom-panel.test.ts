import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../../utils/errors.js';
import { BomFormSchema, BomPanel, type BomForm } from './bom-panel.js';

const settings = { pythonPath: 'python3', scriptPath: '/opt/toolbench/scripts/bom_transform.py' };

function form(overrides: Partial<BomForm>): BomForm {
  return BomFormSchema.parse(overrides);
}

function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('BomPanel', () => {
  let workDir: string;
  let boardCsv: string;
  const panel = new BomPanel(settings);

  beforeEach(() => {
    workDir = mkdtempSync(path.join(os.tmpdir(), 'bom-panel-'));
    boardCsv = path.join(workDir, 'board.csv');
    writeFileSync(boardCsv, 'Reference,Value\nR1,10k\n');
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('defaults the output to <input dir>/outputs and creates it', () => {
    const outputs = path.join(workDir, 'outputs');
    expect(existsSync(outputs)).toBe(false);

    const request = panel.buildRequest(form({ inputPath: boardCsv }));

    expect(existsSync(outputs)).toBe(true);
    expect(request).toEqual({
      panel: 'bom',
      command: 'python3',
      args: [settings.scriptPath, '--input', boardCsv, '--output-dir', outputs],
      cwd: workDir,
    });
  });

  it('creates the suggested output directory when it is submitted explicitly', () => {
    const outputs = path.join(workDir, 'outputs');

    const request = panel.buildRequest(form({ inputPath: boardCsv, outputDir: outputs }));

    expect(existsSync(outputs)).toBe(true);
    expect(request.args).toEqual([settings.scriptPath, '--input', boardCsv, '--output-dir', outputs]);
  });

  it('passes optional fields in a fixed order', () => {
    const mapping = path.join(workDir, 'mapping.yaml');
    writeFileSync(mapping, 'columns: {}\n');
    const out = path.join(workDir, 'custom');
    mkdirSync(out);

    const request = panel.buildRequest(
      form({
        inputPath: boardCsv,
        outputDir: out,
        projectName: 'Widget Rev B',
        mappingPath: mapping,
        encoding: 'utf-8-sig',
        quiet: true,
      })
    );

    expect(request.args).toEqual([
      settings.scriptPath,
      '--input',
      boardCsv,
      '--output-dir',
      out,
      '--project-name',
      'Widget Rev B',
      '--mapping',
      mapping,
      '--encoding',
      'utf-8-sig',
      '--quiet',
    ]);
  });

  it('requires an input file', () => {
    const error = validationErrorOf(() => panel.buildRequest(form({})));
    expect(error.fieldErrors).toEqual({ inputPath: 'Select an input CSV file' });
    expect(error.message).toBe('Select an input CSV file');
  });

  it('reports every invalid field at once', () => {
    const missingOut = path.join(workDir, 'nope');
    const missingMapping = path.join(workDir, 'missing.yaml');

    const error = validationErrorOf(() =>
      panel.buildRequest(
        form({ inputPath: boardCsv, outputDir: missingOut, mappingPath: missingMapping, encoding: 'utf 8' })
      )
    );

    expect(error.message).toBe('3 fields need attention');
    expect(error.fieldErrors).toEqual({
      outputDir: `Output directory does not exist: ${missingOut}`,
      mappingPath: `Mapping file does not exist: ${missingMapping}`,
      encoding: 'Unsupported encoding name: utf 8',
    });
  });

  it('does not create the default output when validation fails', () => {
    const missingMapping = path.join(workDir, 'missing.yaml');
    expect(() => panel.buildRequest(form({ inputPath: boardCsv, mappingPath: missingMapping }))).toThrow(
      ValidationError
    );
    expect(existsSync(path.join(workDir, 'outputs'))).toBe(false);
  });
});

/**
 * BOM Panel
 *
 * Turns the BOM form into a run of the BOM transform script.
 */

import path from 'path';
import { z } from 'zod';
import { FieldErrorCollector } from '../../utils/errors.js';
import type { RunRequest } from '../../types/run.js';
import { defaultOutputDir, ensureDirectory, isExistingDirectory, isExistingFile } from './form-checks.js';

const ENCODING_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const BomFormSchema = z.object({
  inputPath: z.string().trim().default(''),
  outputDir: z.string().trim().default(''),
  projectName: z.string().trim().default(''),
  mappingPath: z.string().trim().default(''),
  encoding: z.string().trim().default(''),
  quiet: z.boolean().default(false),
});

export type BomForm = z.infer<typeof BomFormSchema>;

export interface BomPanelSettings {
  pythonPath: string;
  scriptPath: string;
}

export class BomPanel {
  readonly id = 'bom' as const;

  constructor(private readonly settings: BomPanelSettings) {}

  /**
   * Validate the form and build the run. Throws ValidationError with
   * per-field messages. A blank output, or one equal to the suggested
   * `<input dir>/outputs`, is created when missing.
   */
  buildRequest(form: BomForm): RunRequest {
    const errors = new FieldErrorCollector();

    const inputPath = form.inputPath ? path.resolve(form.inputPath) : '';
    if (!inputPath) {
      errors.add('inputPath', 'Select an input CSV file');
    } else if (!isExistingFile(inputPath)) {
      errors.add('inputPath', `Input file does not exist: ${inputPath}`);
    }

    let outputDir = form.outputDir ? path.resolve(form.outputDir) : '';
    const useDefaultOutput = !outputDir || (inputPath !== '' && outputDir === defaultOutputDir(inputPath));
    if (!useDefaultOutput && !isExistingDirectory(outputDir)) {
      errors.add('outputDir', `Output directory does not exist: ${outputDir}`);
    }

    const mappingPath = form.mappingPath ? path.resolve(form.mappingPath) : '';
    if (mappingPath && !isExistingFile(mappingPath)) {
      errors.add('mappingPath', `Mapping file does not exist: ${mappingPath}`);
    }

    if (form.encoding && !ENCODING_PATTERN.test(form.encoding)) {
      errors.add('encoding', `Unsupported encoding name: ${form.encoding}`);
    }

    errors.throwIfAny('bom.buildRequest');

    if (useDefaultOutput) {
      outputDir = defaultOutputDir(inputPath);
      const failure = ensureDirectory(outputDir);
      if (failure) {
        errors.add('outputDir', failure);
        errors.throwIfAny('bom.buildRequest');
      }
    }

    const args = [this.settings.scriptPath, '--input', inputPath, '--output-dir', outputDir];
    if (form.projectName) args.push('--project-name', form.projectName);
    if (mappingPath) args.push('--mapping', mappingPath);
    if (form.encoding) args.push('--encoding', form.encoding);
    if (form.quiet) args.push('--quiet');

    return {
      panel: this.id,
      command: this.settings.pythonPath,
      args,
      cwd: path.dirname(inputPath),
    };
  }
}

/**
 * KiCad Panel
 *
 * Turns the KiCad form into a run of the export/ERC/DRC script. The CLI
 * location found at startup is handed in at construction.
 */

import path from 'path';
import { z } from 'zod';
import { FieldErrorCollector } from '../../utils/errors.js';
import type { RunRequest } from '../../types/run.js';
import type { CliLocation } from '../cli-locator/index.js';
import { defaultOutputDir, ensureDirectory, isExistingFile } from './form-checks.js';

export const KICAD_PROJECT_EXTENSION = '.kicad_pro';

export const KicadFormSchema = z.object({
  projectPath: z.string().trim().default(''),
  outputDir: z.string().trim().default(''),
  cliPath: z.string().trim().default(''),
  skipChecks: z.boolean().default(false),
  skipExports: z.boolean().default(false),
  exportMode: z.boolean().default(false),
});

export type KicadForm = z.infer<typeof KicadFormSchema>;

export interface KicadPanelSettings {
  pythonPath: string;
  scriptPath: string;
}

export class KicadPanel {
  readonly id = 'kicad' as const;
  private cliLocation: CliLocation;

  constructor(
    private readonly settings: KicadPanelSettings,
    startupLocation: CliLocation
  ) {
    this.cliLocation = startupLocation;
  }

  /** Value the CLI path field starts with; blank when nothing was found */
  defaultCliPath(): string {
    return this.cliLocation.found ? this.cliLocation.path : '';
  }

  cliStatus(): CliLocation {
    return this.cliLocation;
  }

  setDetectedCliPath(location: CliLocation): void {
    this.cliLocation = location;
  }

  buildRequest(form: KicadForm): RunRequest {
    const errors = new FieldErrorCollector();

    const projectPath = form.projectPath ? path.resolve(form.projectPath) : '';
    if (!projectPath) {
      errors.add('projectPath', 'Select a KiCad project file');
    } else if (!projectPath.toLowerCase().endsWith(KICAD_PROJECT_EXTENSION)) {
      errors.add('projectPath', `Project must be a ${KICAD_PROJECT_EXTENSION} file`);
    } else if (!isExistingFile(projectPath)) {
      errors.add('projectPath', `Project file does not exist: ${projectPath}`);
    }

    const cliPath = form.cliPath ? path.resolve(form.cliPath) : '';
    if (cliPath && !isExistingFile(cliPath)) {
      errors.add('cliPath', `kicad-cli not found at ${cliPath}`);
    }

    if (form.skipChecks && form.skipExports) {
      errors.add('skipExports', 'Skipping both checks and exports leaves nothing to run');
    }

    errors.throwIfAny('kicad.buildRequest');

    // An explicit output directory is passed through; the script reports problems with it
    let outputDir = form.outputDir ? path.resolve(form.outputDir) : '';
    if (!outputDir) {
      outputDir = defaultOutputDir(projectPath);
      const failure = ensureDirectory(outputDir);
      if (failure) {
        errors.add('outputDir', failure);
        errors.throwIfAny('kicad.buildRequest');
      }
    }

    const args = [this.settings.scriptPath, projectPath, '--output', outputDir];
    if (cliPath) args.push('--kicad-cli', cliPath);
    if (form.skipChecks) args.push('--skip-checks');
    if (form.skipExports) args.push('--skip-exports');
    if (form.exportMode) args.push('--export-mode');

    return {
      panel: this.id,
      command: this.settings.pythonPath,
      args,
      cwd: path.dirname(projectPath),
    };
  }
}

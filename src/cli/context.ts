/**
 * Shared setup for commands that answer questions
 */

import { createInfobot, type Infobot } from '../index.js';
import { errorMessage, getExitCodeForKind, isTypedError } from '../lib/errors.js';
import { configureLogging, fatal, loadConfig } from './utils.js';

/** Options every question-answering command accepts */
export interface CommonOptions {
  lang?: string;
  verbose: boolean;
}

/**
 * Apply logging flags, load configuration and wire the pipeline;
 * exits on invalid configuration
 */
export async function createCliInfobot(options: CommonOptions): Promise<Infobot> {
  configureLogging(options.verbose);

  try {
    const config = await loadConfig();
    return createInfobot({ ...config, ...(options.lang ? { lang: options.lang } : {}) });
  } catch (error) {
    fatal(errorMessage(error), isTypedError(error) ? getExitCodeForKind(error.kind) : 1);
  }
}

/**
 * Loading steps shared by the commands.
 */
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { loadModelFile, type ModelSet } from '../../core/model-file/loader.js';
import { logger } from '../../utils/logger.js';

export interface ProjectContext {
  config: Config;
  models: ModelSet;
  /** Absolute path of the loaded model file */
  modelsPath: string;
}

/**
 * Load config, apply its log level and load the model file.
 */
export async function loadProject(
  projectRoot: string,
  options: { config?: string; models?: string }
): Promise<ProjectContext> {
  const config = await loadConfig(projectRoot, options.config);
  logger.setLevel(config.logging.level);

  const modelsPath = path.resolve(projectRoot, options.models ?? config.models.path);
  logger.debug(`Loading models from ${modelsPath}`);
  const models = await loadModelFile(modelsPath, { nameConvention: config.models.name_convention });

  return { config, models, modelsPath };
}
